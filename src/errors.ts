export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    message: string,
    readonly node?: unknown,
  ) {
    super(node === undefined ? message : `${message}: ${describeNode(node)}`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ModificationRejectedError extends Error {
  override readonly name = 'ModificationRejectedError';

  constructor(
    message: string,
    readonly requestedOperation: string | null = null,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AlignmentInvariantViolation extends Error {
  override readonly name = 'AlignmentInvariantViolation';

  constructor(
    readonly production: string,
    readonly expected: number,
    readonly actual: number,
    message?: string,
  ) {
    super(
      message ??
        `Alignment check failed for "${production}": expected ${expected} distinct locations, got ${actual}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RecordStoreError extends Error {
  override readonly name = 'RecordStoreError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const MAX_NODE_DESCRIPTION = 200;

function describeNode(node: unknown): string {
  let text: string;
  try {
    text = JSON.stringify(node) ?? String(node);
  } catch {
    text = String(node);
  }
  return text.length > MAX_NODE_DESCRIPTION ? `${text.slice(0, MAX_NODE_DESCRIPTION)}...` : text;
}
