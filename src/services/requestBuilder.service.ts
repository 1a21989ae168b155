// Leaving out `date` makes the service answer with its latest rate
export function buildUrl(baseUrl: string, from: string, to: string, date?: string): string {
  const dateParam = date ? `&date=${date}` : '';
  return `${baseUrl.replace(/\/+$/, '')}/?from=${from}&to=${to}${dateParam}`;
}

export function buildFileName(from: string, to: string, date: string): string {
  return `${from}_${to}_${date}.json`;
}
