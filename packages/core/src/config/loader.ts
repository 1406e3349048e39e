import { existsSync, readFileSync } from "node:fs";
import JSON5 from "json5";
import { InvalidArgumentError } from "../infra/errors.js";
import { ChatlogConfigSchema } from "./schema.js";
import type { ChatlogConfig } from "./types.js";

/**
 * Load and validate a JSON or JSON5 defaults file.
 */
export function loadConfig(filePath: string): ChatlogConfig {
  if (!existsSync(filePath)) {
    throw new InvalidArgumentError(`Config file not found: ${filePath}`);
  }

  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new InvalidArgumentError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }

  const result = ChatlogConfigSchema.safeParse(parsed);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`,
    );
    throw new InvalidArgumentError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
      result.error,
    );
  }
  return result.data;
}
