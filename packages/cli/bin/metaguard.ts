#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";

import { createMetadataPolicyEngine, loadPolicyTable, type PolicyTable } from "@metaguard/policy";
import { createMetaguardLogger, getMetaguardTracer, runWithSpan } from "@metaguard/telemetry";

import { loadMetaguardConfig } from "../src/config.js";
import { OUTPUT_FORMATS, formatOutput, isOutputFormat, type OutputFormat } from "../src/files.js";
import { flattenLegacyFile } from "../src/legacy-file.js";
import { describePolicyTable } from "../src/policy-table.js";
import { evaluateScenario, loadScenario } from "../src/scenario.js";

const parseFormat = (value: string): OutputFormat => {
  if (isOutputFormat(value)) {
    return value;
  }
  throw new InvalidArgumentError(`Unsupported output format ${value}. Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
};

interface GlobalOptions {
  readonly policyFile?: string;
}

interface FormatOptions {
  readonly format: OutputFormat;
}

const main = async (): Promise<void> => {
  const config = loadMetaguardConfig();
  const logger = createMetaguardLogger({ name: "metaguard-cli", level: config.logLevel });
  const tracer = getMetaguardTracer({ name: "metaguard-cli" });
  const program = new Command();

  const loadTable = async (): Promise<PolicyTable> => {
    const { policyFile } = program.opts<GlobalOptions>();
    const table = await loadPolicyTable(policyFile);
    logger.debug("cli.policy.loaded", { policyFile: policyFile ?? "default", rules: table.size });
    return table;
  };

  program
    .name("metaguard")
    .description("Inspect and exercise the metadata access policy")
    .option("--policy-file <path>", "YAML or JSON policy overrides", config.policyFile);

  program
    .command("policy")
    .description("Print the effective policy table")
    .option("--format <format>", "Output format (json|yaml)", parseFormat, "yaml")
    .action(async (options: FormatOptions) => {
      const table = await loadTable();
      console.log(formatOutput(describePolicyTable(table), options.format));
    });

  program
    .command("check")
    .description("Evaluate the cases of a scenario file against the policy")
    .argument("<scenario>", "Path to the scenario file (JSON or YAML)")
    .option("--format <format>", "Output format (json|yaml)", parseFormat, "yaml")
    .action(async (scenarioPath: string, options: FormatOptions) => {
      const scenario = await loadScenario(scenarioPath);
      const engine = createMetadataPolicyEngine({ table: await loadTable() });
      const report = await runWithSpan(tracer, "cli.check", () => evaluateScenario(scenario, engine), {
        attributes: { "metaguard.scenario.cases": scenario.cases.length },
      });
      console.log(formatOutput(report, options.format));
      if (report.failed > 0) {
        logger.warn("cli.check.expectations_failed", { scenario: scenarioPath, failed: report.failed });
        process.exitCode = 1;
      }
    });

  program
    .command("flatten")
    .description("Convert a namespaced legacy metadata record into flat key/value items")
    .argument("<file>", "Path to the legacy record (JSON or YAML)")
    .option("--format <format>", "Output format (json|yaml)", parseFormat, "json")
    .action(async (filePath: string, options: FormatOptions) => {
      console.log(formatOutput(await flattenLegacyFile(filePath), options.format));
    });

  await program.parseAsync(process.argv);
};

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
