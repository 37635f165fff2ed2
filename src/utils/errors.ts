export class StaleVersionError extends Error {
  constructor(uri: string, version: number, current: number) {
    super(`Stale version ${version} for ${uri} (current version is ${current})`);
    this.name = 'StaleVersionError';
  }
}

export class UnknownDocumentError extends Error {
  constructor(uri: string) {
    super(`Document is not open: ${uri}`);
    this.name = 'UnknownDocumentError';
  }
}

export class InvalidEditError extends Error {
  constructor(uri: string, message: string) {
    super(`Invalid edit for ${uri}: ${message}`);
    this.name = 'InvalidEditError';
  }
}

export class CapabilityDisabledError extends Error {
  readonly capability: string;

  constructor(capability: string) {
    super(`Capability not supported: ${capability}`);
    this.name = 'CapabilityDisabledError';
    this.capability = capability;
  }
}

export class VCardParseError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line + 1}: ${message}`);
    this.name = 'VCardParseError';
    this.line = line;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ContactsDirectoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContactsDirectoryError';
  }
}

/** Node filesystem errors carry a string `code`; everything else has none. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
