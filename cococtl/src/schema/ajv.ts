import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export type AjvError = {
  keyword: string;
  instancePath: string;
  message?: string;
  params: Record<string, unknown>;
};

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: AjvError[] | null };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  errorsText: (errors: AjvError[] | null | undefined, opts?: { dataVar?: string; separator?: string }) => string;
};

export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);

  return ajv;
}

/**
 * ajv's text for each error, one per line, with the key that an
 * `additionalProperties` or `propertyNames` error is about appended.
 */
export function describeErrors(ajv: AjvInstance, errors: AjvError[] | null | undefined, dataVar: string): string {
  return (errors ?? [])
    .map((err) => {
      const text = ajv.errorsText([err], { dataVar });
      const key = err.params.additionalProperty ?? err.params.propertyName;
      return typeof key === "string" ? `${text}: ${key}` : text;
    })
    .join("\n");
}
