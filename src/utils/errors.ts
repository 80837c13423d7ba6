export class ParseError extends Error {
  readonly input: string;
  readonly typeName: string;

  constructor(input: string, typeName: string) {
    super(`Cannot read "${input}" as ${typeName}`);
    this.name = 'ParseError';
    this.input = input;
    this.typeName = typeName;
  }
}

export class InputClosedError extends Error {
  constructor(message = 'Input stream closed while waiting for a value') {
    super(message);
    this.name = 'InputClosedError';
  }
}

export class NoConstructorError extends Error {
  readonly typeName: string;

  constructor(typeName: string) {
    super(`No constructor registered for type: ${typeName}`);
    this.name = 'NoConstructorError';
    this.typeName = typeName;
  }
}

export class ConstructionError extends Error {
  readonly typeName: string;

  constructor(typeName: string, cause: unknown) {
    super(`Failed to create instance of ${typeName}`, { cause });
    this.name = 'ConstructionError';
    this.typeName = typeName;
  }
}

export class InvocationError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Operation "${operation}" failed`, { cause });
    this.name = 'InvocationError';
    this.operation = operation;
  }
}

export class UnknownParameterError extends Error {
  constructor(parameter: string) {
    super(`Parameter "${parameter}" is not part of this argument list`);
    this.name = 'UnknownParameterError';
  }
}

export class LabelNotFoundError extends Error {
  readonly label: string;

  constructor(label: string, kind: 'method' | 'custom option') {
    super(`${kind === 'method' ? 'Method' : 'Custom option'} display name not found: ${label}`);
    this.name = 'LabelNotFoundError';
    this.label = label;
  }
}

export class DuplicateLabelError extends Error {
  readonly label: string;

  constructor(label: string) {
    super(`Display name already in use: ${label}`);
    this.name = 'DuplicateLabelError';
    this.label = label;
  }
}

export class CardinalityMismatchError extends Error {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`Mismatch in the number of new keys provided: expected ${expected}, got ${received}`);
    this.name = 'CardinalityMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

export class OptionIndexError extends Error {
  constructor(index: number, size: number) {
    super(`Option index ${index} out of bounds (0..${size - 1}). Option indexes start from zero.`);
    this.name = 'OptionIndexError';
  }
}

export class InvalidSettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSettingsError';
  }
}

/**
 * Full diagnostic text for an error: its stack (or message) followed by every
 * `cause` in the chain.
 */
export function formatErrorDetail(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  let depth = 0;

  while (current !== undefined && depth < 10) {
    const prefix = depth === 0 ? '' : 'Caused by: ';
    if (current instanceof Error) {
      parts.push(prefix + (current.stack ?? `${current.name}: ${current.message}`));
      current = current.cause;
    } else {
      parts.push(prefix + String(current));
      current = undefined;
    }
    depth++;
  }

  return parts.join('\n');
}
