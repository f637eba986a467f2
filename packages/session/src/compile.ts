import type { ComponentOptions, Configuration } from "@cradlekit/cradle";

export type CompileResult<A> =
  | {
      readonly kind: "ok";
      readonly artifact: A;
      /** Artifacts for other modules produced by the same compile, keyed by file. */
      readonly related?: readonly (readonly [file: string, artifact: A])[];
    }
  | { readonly kind: "error"; readonly message: string };

/**
 * Compiles one file under a resolved configuration. Rejections are treated
 * as compile failures.
 */
export type CompileFunction<A> = (
  configuration: Configuration,
  file: string,
  options: ComponentOptions,
) => Promise<CompileResult<A>>;
