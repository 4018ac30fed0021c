export abstract class CallableClassBase {
  constructor() {
    const closure = function (...args: unknown[]) {
      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      return (closure as any as CallableClassBase).fnImpl(...args);
    };
    return Object.setPrototypeOf(closure, new.target.prototype);
  }

  protected abstract fnImpl(...args: unknown[]): unknown;
}

export function mergeAbortSignals(...args: (AbortSignal | undefined | null)[]): AbortSignal | null {
  const signals = args.filter(s => s != null);
  if (signals.length === 1) {
    return signals[0];
  } else if (signals.length > 1) {
    return AbortSignal.any(signals);
  } else {
    return null;
  }
}

export function isTemplateStringArray(value: unknown): value is TemplateStringsArray {
  return value != null && Array.isArray(value);
}

export function isErrorWithCode(value: unknown): value is Error & { code: string } {
  return value instanceof Error && "code" in value && typeof value.code === "string";
}
