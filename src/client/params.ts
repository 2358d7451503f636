import { z } from "zod";

const JsonObjectSchema = z.record(z.unknown());

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = JsonObjectSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Turns CLI words after the method into request params.
 *
 * - no words: no params
 * - `tools/call <tool> [json]`: `{ name, arguments }`
 * - one JSON object: that object
 * - anything else: `{ args: [...] }`
 */
export function buildParams(method: string, args: string[]): Record<string, unknown> | undefined {
  if (method === "tools/call") {
    const [name, json] = args;
    if (!name) {
      throw new Error("tools/call needs a tool name");
    }
    if (json === undefined) {
      return { name, arguments: {} };
    }
    const toolArguments = parseJsonObject(json);
    if (!toolArguments) {
      throw new Error(`Tool arguments must be a JSON object, got: ${json}`);
    }
    return { name, arguments: toolArguments };
  }
  if (args.length === 0) {
    return undefined;
  }
  if (args.length === 1) {
    const params = parseJsonObject(args[0]);
    if (params) {
      return params;
    }
  }
  return { args };
}
