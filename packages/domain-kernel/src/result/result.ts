type Outcome<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export class Result<T, E = string> {
  public readonly isSuccess: boolean;
  public readonly isFailure: boolean;

  private constructor(private readonly outcome: Outcome<T, E>) {
    this.isSuccess = outcome.ok;
    this.isFailure = !outcome.ok;
    Object.freeze(this);
  }

  public getValue(): T {
    if (!this.outcome.ok) {
      throw new Error("Can't get the value of an error result. Use getError instead.");
    }
    return this.outcome.value;
  }

  public getError(): E {
    if (this.outcome.ok) {
      throw new Error("Can't get the error of a success result. Use getValue instead.");
    }
    return this.outcome.error;
  }

  public static ok(): Result<void, never>;
  public static ok<U>(value: U): Result<U, never>;
  public static ok<U>(value?: U): Result<U | undefined, never> {
    return new Result<U | undefined, never>({ ok: true, value });
  }

  public static fail<U, E>(error: E): Result<U, E> {
    return new Result<U, E>({ ok: false, error });
  }
}
