import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import type { ErrorObject } from "ajv";

export type AjvValidateFn<T = unknown> = ((data: unknown) => data is T) & { errors?: ErrorObject[] | null };

export type AjvInstance = {
  compile: <T = unknown>(schema: unknown) => AjvValidateFn<T>;
  addSchema: (schema: unknown) => AjvInstance;
  getSchema: <T = unknown>(keyRef: string) => AjvValidateFn<T> | undefined;
  errorsText: (errors: ErrorObject[] | null | undefined) => string;
};

export async function loadAjv(): Promise<AjvInstance> {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true, strictRequired: false });
  add(ajv);

  return ajv;
}
