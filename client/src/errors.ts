export class TransportError extends Error {
  readonly code?: number;

  constructor(message: string, code?: number) {
    super(message);
    this.name = "TransportError";
    this.code = code;
  }
}

export class DecodeError extends Error {
  readonly responseCode?: number;
  readonly byteLength: number;

  constructor(message: string, byteLength: number, responseCode?: number) {
    super(message);
    this.name = "DecodeError";
    this.byteLength = byteLength;
    this.responseCode = responseCode;
  }
}

export class ResolutionError extends Error {
  readonly label: string;

  constructor(label: string, message = `Unable to locate instrument for ${label}`) {
    super(message);
    this.name = "ResolutionError";
    this.label = label;
  }
}

export class AuthError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message);
    this.name = "AuthError";
    this.attempts = attempts;
  }
}
