import { z } from "zod";

export interface HydrateOptions {
  /** Called for every field dropped because its value had the wrong shape */
  onMalformed?: (path: string, value: unknown) => void;
}

/** Any JSON scalar. Grant fields carry these through unchanged */
export type Scalar = string | number | boolean;

/** Schema producing `T` from an untyped claim payload */
export type ClaimSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// Set for the duration of a synchronous `hydrate` call
let reportMalformed: HydrateOptions["onMalformed"];

function formatPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((out, part) => {
    if (typeof part === "number") return `${out}[${part}]`;
    return out ? `${out}.${part}` : part;
  }, "");
}

function dropped(ctx: { error: z.ZodError; input: unknown }): undefined {
  if (ctx.input !== undefined && ctx.input !== null) {
    reportMalformed?.(formatPath(ctx.error.issues[0]?.path ?? []), ctx.input);
  }
  return undefined;
}

function compact<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) out[key] = value[key];
  }
  return out;
}

function present<V>(items: (V | undefined)[]): V[] {
  return items.filter((item): item is V => item !== undefined);
}

function definedEntries<V>(map: Record<string, V | undefined>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const [key, value] of Object.entries(map)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** A field left absent when missing or malformed */
export function field<T extends z.ZodTypeAny>(schema: T) {
  return schema.optional().catch(dropped);
}

export const scalar = z.union([z.string(), z.number(), z.boolean()]);

/** Object of lenient fields; unknown keys are stripped */
export function record<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).transform(compact);
}

/** Array whose malformed elements are removed */
export function list<T extends z.ZodTypeAny>(element: T) {
  return z.array(field(element)).transform(present);
}

export const scalarList = list(scalar);

/** Caller data map; entries that are not scalars are removed */
export const scalarMap = z
  .record(z.string(), field(scalar))
  .transform(definedEntries);

/**
 * Build a typed record from an untyped mapping. Unknown keys are ignored,
 * missing or malformed fields are left absent. Returns `undefined` only
 * when the input itself is not a mapping.
 */
export function hydrate<T>(
  schema: ClaimSchema<T>,
  input: unknown,
  options: HydrateOptions = {},
): T | undefined {
  const previous = reportMalformed;
  reportMalformed = options.onMalformed;
  try {
    const result = schema.safeParse(input);
    if (result.success) return result.data;
    if (input !== undefined && input !== null) {
      options.onMalformed?.("", input);
    }
    return undefined;
  } finally {
    reportMalformed = previous;
  }
}
