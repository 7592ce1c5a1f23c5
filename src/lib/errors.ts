export class IconError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised before drawing when the inputs leave no drawable region. */
export class InvalidGeometryError extends IconError {
  readonly size: number;
  readonly paddingRatio: number;

  constructor(size: number, paddingRatio: number, reason: string) {
    super(`Invalid icon geometry (size=${size}, paddingRatio=${paddingRatio}): ${reason}`);
    this.size = size;
    this.paddingRatio = paddingRatio;
  }
}

export type FilesystemOperation = 'create' | 'write';

export class FilesystemError extends IconError {
  readonly artifact: string;
  readonly path: string;
  readonly operation: FilesystemOperation;

  constructor(artifact: string, path: string, cause: unknown, operation: FilesystemOperation = 'write') {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${artifact} at ${path}: ${detail}`, { cause });
    this.artifact = artifact;
    this.path = path;
    this.operation = operation;
  }
}
