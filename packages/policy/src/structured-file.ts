import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";

const parseContents = (contents: string, format: "json" | "yaml"): unknown =>
  format === "json" ? JSON.parse(contents) : parseYaml(contents);

/**
 * Reads a JSON or YAML document. Files without a known extension are tried as JSON first.
 */
export const readStructuredFile = async (filePath: string): Promise<unknown> => {
  const contents = await readFile(filePath, "utf8");
  const extension = extname(filePath).toLowerCase();
  if (extension === ".json") {
    return parseContents(contents, "json");
  }
  if (extension === ".yaml" || extension === ".yml") {
    return parseContents(contents, "yaml");
  }
  try {
    return parseContents(contents, "json");
  } catch {
    return parseContents(contents, "yaml");
  }
};
