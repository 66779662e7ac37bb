export interface FieldError {
  path: string;
  message: string;
}

export type HeapErrorCode = "INVALID_ARGUMENT";

const TITLES: Record<HeapErrorCode, string> = {
  INVALID_ARGUMENT: "Invalid argument",
};

/**
 * Thrown at construction when options would make the heap unusable
 * (for example a growth factor that never grows the buffer).
 */
export class HeapConfigError extends Error {
  readonly code: HeapErrorCode;
  readonly title: string;
  readonly errors: FieldError[];

  constructor(params: { code: HeapErrorCode; detail?: string; errors?: FieldError[] }) {
    const title = TITLES[params.code];
    const errors = params.errors ?? [];
    const detail = params.detail ?? errors.map((e) => `${e.path} ${e.message}`).join("; ");
    super(`${title}: ${detail}`);
    this.name = "HeapConfigError";
    this.code = params.code;
    this.title = title;
    this.errors = errors;
  }
}
