import { z } from "zod";

/**
 * Strips markdown fences and surrounding prose from a model's JSON answer.
 */
export function cleanJsonOutput(output: string): string {
  let clean = output.replace(/```json\n?|```/g, "");

  const firstOpen = clean.indexOf("{");
  const lastClose = clean.lastIndexOf("}");

  if (firstOpen !== -1 && lastClose !== -1 && lastClose > firstOpen) {
    clean = clean.substring(firstOpen, lastClose + 1);
  }

  return clean;
}

/**
 * JSON schema for structured model output.
 */
export const getJSONSchema = (schema: z.ZodType) => {
  return z.toJSONSchema(schema, { unrepresentable: "any" });
};
