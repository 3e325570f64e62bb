import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvErrorObject = {
  instancePath: string;
  keyword: string;
  message?: string;
  params: Record<string, unknown>;
};

export type AjvValidateFn = ((data: unknown) => boolean) & { errors?: AjvErrorObject[] | null };

export type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
};

/** Ajv with the 2020-12 dialect, strict mode and string formats. */
export function createAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}

/** One line per error: `/workflows/cpu must be array`. */
export function formatAjvErrors(errors: readonly AjvErrorObject[] | null | undefined): string[] {
  if (!errors) return [];
  return errors.map((e) => {
    const where = e.instancePath === "" ? "(root)" : e.instancePath;
    const extra =
      e.keyword === "additionalProperties" && typeof e.params.additionalProperty === "string"
        ? ` '${e.params.additionalProperty}'`
        : e.keyword === "enum" && Array.isArray(e.params.allowedValues)
          ? ` (${e.params.allowedValues.map(String).join(", ")})`
          : "";
    return `${where} ${e.message ?? e.keyword}${extra}`;
  });
}
