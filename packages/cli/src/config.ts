import { z } from "zod";

import { isLogLevel, type MetaguardLogLevel } from "@metaguard/telemetry";

export class MetaguardConfigError extends Error {
  constructor(readonly issues: ReadonlyArray<string>) {
    super(`Invalid metaguard environment: ${issues.join("; ")}`);
    this.name = "MetaguardConfigError";
  }
}

export interface MetaguardConfig {
  /**
   * YAML or JSON policy overrides merged over the default table.
   */
  readonly policyFile?: string;
  readonly logLevel: MetaguardLogLevel;
}

const environmentSchema = z.object({
  METAGUARD_POLICY_FILE: z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined),
  METAGUARD_LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value) => value.trim().toLowerCase())
    .refine(isLogLevel, { message: "Expected one of debug, info, warn, error" }),
});

export const loadMetaguardConfig = (env: NodeJS.ProcessEnv = process.env): MetaguardConfig => {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new MetaguardConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return {
    policyFile: parsed.data.METAGUARD_POLICY_FILE,
    logLevel: parsed.data.METAGUARD_LOG_LEVEL,
  };
};
