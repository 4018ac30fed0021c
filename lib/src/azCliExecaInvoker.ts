import { $ as Execa$ } from "execa";
import type { ExecaError, TemplateExpression as ExecaTemplateExpression } from "execa";
import { CallableClassBase, isTemplateStringArray } from "./tsUtils.js";
import {
  type AzCliInvoker,
  ensureAzPrefix,
  isNotFoundOutput,
  type AzTemplateExpression,
  type AzTemplateExpressionItem,
  type AzCliOptions,
} from "./azCliInvoker.js";

function prepareExecaExpressionItem(e: AzTemplateExpressionItem): string | number {
  if (e == null) {
    return "";
  }

  if (typeof e === "string" || typeof e === "number") {
    return e;
  }

  return e.toString();
}

function isExpressionList(e: AzTemplateExpression): e is readonly AzTemplateExpressionItem[] {
  return Array.isArray(e);
}

function prepareExecaExpressionArg(e: AzTemplateExpression): ExecaTemplateExpression {
  return isExpressionList(e) ? e.map(prepareExecaExpressionItem) : prepareExecaExpressionItem(e);
}

function isExecaError(value: unknown): value is ExecaError {
  return value instanceof Error && "stderr" in value;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging, @typescript-eslint/no-empty-object-type
export interface AzCliExecaInvoker extends AzCliInvoker {}

/**
 * Invokes the Azure CLI through execa using tagged templates.
 * @remarks
 * Calling the instance with an options object returns a new invoker with those options merged in.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class AzCliExecaInvoker extends CallableClassBase implements AzCliInvoker {
  #options: AzCliOptions;

  constructor(options?: AzCliOptions) {
    super();

    this.#options = {
      forceAzCommandPrefix: true,
      allowBlanks: false,
      ...options,
    };
  }

  protected fnImpl(
    ...args:
      | [options: AzCliOptions]
      | [templates: TemplateStringsArray, ...expressions: readonly AzTemplateExpression[]]
    // eslint-disable-next-line @typescript-eslint/no-explicit-any
  ): any {
    const [first, ...rest] = args;
    if (first != null) {
      if (isTemplateStringArray(first)) {
        return this.#templateFn(first, ...rest);
      }

      if (typeof first === "object") {
        return this.#withOptions(first);
      }
    }

    throw new Error("An option or template is required");
  }

  async #templateFn(templates: TemplateStringsArray, ...expressions: readonly AzTemplateExpression[]): Promise<unknown> {
    const execaEnv: NodeJS.ProcessEnv = {
      ...this.#options.env,
      AZURE_CORE_OUTPUT: "json", // request json by default
      AZURE_CORE_ONLY_SHOW_ERRORS: "true",
      AZURE_CORE_DISABLE_PROGRESS_BAR: "true",
      AZURE_CORE_NO_COLOR: "true",
      AZURE_CORE_LOGIN_EXPERIENCE_V2: "off", // account selection is handled by AccountTools
    };

    const execaExpressions = expressions.map(prepareExecaExpressionArg);

    if (this.#options.forceAzCommandPrefix) {
      templates = ensureAzPrefix(templates);
    }

    const execaFn = Execa$({
      env: execaEnv,
      stdin: "inherit",
      stdout: "pipe",
      stderr: "pipe",
      cancelSignal: this.#options.abortSignal,
    });

    let invocationResult;
    try {
      invocationResult = await execaFn(templates, ...execaExpressions);
    } catch (invocationError) {
      if (this.#options.allowBlanks && isExecaError(invocationError) && isNotFoundOutput(invocationError.stderr)) {
        return null;
      }

      throw invocationError;
    }

    const { stdout, stderr } = invocationResult;

    if (typeof stderr === "string" && stderr !== "") {
      console.warn(stderr);
    }

    if (typeof stdout !== "string") {
      throw new Error("Failed to parse invocation result");
    }

    if (stdout.trim() === "") {
      if (this.#options.allowBlanks) {
        return null;
      }

      throw new Error("Result was blank");
    }

    return JSON.parse(stdout);
  }

  #withOptions(options: AzCliOptions) {
    return new AzCliExecaInvoker({
      ...this.#options,
      ...options,
    });
  }
}
