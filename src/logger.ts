export function log(message: string, date = new Date()): void {
  const ts = date.toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
  console.log(`[${ts}] ${message}`);
}
