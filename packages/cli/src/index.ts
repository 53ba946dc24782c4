export { MetaguardConfigError, loadMetaguardConfig } from "./config.js";
export type { MetaguardConfig } from "./config.js";
export { OUTPUT_FORMATS, formatOutput, isOutputFormat } from "./files.js";
export type { OutputFormat } from "./files.js";
export { ScenarioError, evaluateScenario, loadScenario, parseScenario } from "./scenario.js";
export type { Scenario, ScenarioCase, ScenarioCaseReport, ScenarioReport } from "./scenario.js";
export { describePolicyTable } from "./policy-table.js";
export { flattenLegacyFile } from "./legacy-file.js";
export type { FlattenedMetadata } from "./legacy-file.js";
