import { err } from "@metaguard/contracts";
import type { MetaguardError, Result } from "@metaguard/contracts";
import type { ZodType, ZodTypeDef } from "zod";

/**
 * Parses an input using the provided Zod schema and converts validation failures into Result errors.
 */
export const safeParse = <TOutput, TInput = TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  input: unknown,
  errorFactory: (issues: string) => MetaguardError,
): Result<TOutput, MetaguardError> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    const detail = messages.length > 0 ? messages.join("; ") : parsed.error.message;
    return err(errorFactory(detail));
  }
  return { ok: true, value: parsed.data };
};
