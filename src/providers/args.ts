import { z } from "zod";
import { InvalidProviderArgumentError } from "../errors";
import { ProviderArgs } from "./provider.types";

export function describeZodError(err: z.ZodError): string {
  return err.issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}

/**
 * Validate a provider's arguments, turning schema failures into
 * InvalidProviderArgumentError so callers see one error kind per bad rule.
 */
export function parseProviderArgs<S extends z.ZodTypeAny>(
  providerId: string,
  schema: S,
  args: ProviderArgs
): z.output<S> {
  const res = schema.safeParse(args);
  if (!res.success) {
    throw new InvalidProviderArgumentError(
      `Invalid arguments for provider "${providerId}": ${describeZodError(res.error)}`
    );
  }
  return res.data;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * Text form of a column value. pg hands out `date` columns as local
 * midnight, so those become YYYY-MM-DD from the local calendar fields;
 * any other Date is a timestamp and is written in UTC ISO form. Either way
 * the result does not depend on the process time zone.
 */
export function valueText(value: unknown): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return String(value);
    const midnight =
      value.getHours() === 0 && value.getMinutes() === 0 && value.getSeconds() === 0 && value.getMilliseconds() === 0;
    if (midnight) {
      return `${pad(value.getFullYear(), 4)}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
    }
    return value.toISOString();
  }
  return String(value);
}

/** String providers work on the text form; null stays null. */
export function asText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return valueText(value);
}
