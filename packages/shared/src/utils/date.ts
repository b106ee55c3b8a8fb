export function nowUTC(): string {
  return new Date().toISOString();
}

