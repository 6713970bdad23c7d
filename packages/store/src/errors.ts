export class StoreWriteError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write record store ${path}: ${reason}`, { cause });
    this.name = 'StoreWriteError';
    this.path = path;
  }
}
