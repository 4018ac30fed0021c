interface Stringy {
  toString(): string;
}

export type AzTemplateExpressionItem =
  | undefined // Optional arguments collapse to nothing
  | null
  | string
  | number
  | Stringy;
export type AzTemplateExpression = AzTemplateExpressionItem | readonly AzTemplateExpressionItem[];

export interface AzCliInvocationOptions {
  env?: NodeJS.ProcessEnv;
  forceAzCommandPrefix?: boolean;
  abortSignal?: AbortSignal;
}

export interface AzCliParsingOptions {
  /** Treat blank output and "not found" failures as a null result. */
  allowBlanks?: boolean;
}

export type AzCliOptions = AzCliInvocationOptions & AzCliParsingOptions;

export interface AzCliTemplateFn<TBlankResult extends null | never> {
  <TResult>(
    templates: TemplateStringsArray,
    ...expressions: readonly AzTemplateExpression[]
  ): Promise<TResult | TBlankResult>;
}

interface AzCliSpawnFn {
  <TOptions extends AzCliOptions>(
    options: TOptions,
  ): AzCliTemplateFn<TOptions extends { allowBlanks: true } ? null : never>;
}

export interface AzCliInvoker extends AzCliTemplateFn<never>, AzCliSpawnFn {}

export function ensureAzPrefix(templates: TemplateStringsArray) {
  if (templates.length > 0 && !/^\s*az\s/i.test(templates[0])) {
    const [firstCookedTemplate, ...remainingCookedTemplates] = templates;
    const [firstRawTemplate, ...remainingRawTemplates] = templates.raw;
    templates = Object.assign([`az ${firstCookedTemplate}`, ...remainingCookedTemplates], {
      raw: [`az ${firstRawTemplate}`, ...remainingRawTemplates],
    });
  }

  return templates;
}

export function isNotFoundOutput(stderr: unknown): boolean {
  return typeof stderr === "string" && /not\s*found/i.test(stderr);
}
