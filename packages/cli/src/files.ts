import { stringify as stringifyYaml } from "yaml";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some((format) => format === value);

export const formatOutput = (value: unknown, format: OutputFormat): string =>
  format === "json" ? JSON.stringify(value, null, 2) : stringifyYaml(value);
