function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').replace(/\.\d+Z/, '');
}

export function log(message: string): void {
  console.log(`[${timestamp()}] ${message}`);
}

/** Same line format on stderr, for failures the operator must see. */
export function logError(message: string): void {
  console.error(`[${timestamp()}] ${message}`);
}
