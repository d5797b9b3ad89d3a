import path from "node:path";
import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { ConfigurationError, describeError } from "../errors.js";
import { FlowConfigZ, formatIssues, type FlowConfig } from "./schema.js";

export function defaultConfigPath(): string {
  return path.resolve(process.cwd(), process.env.FLOW_CONFIG ?? "config/flow.yaml");
}

/**
 * Parse an already-read document. Accepts anything the schema accepts, including `{}`
 * (every section has defaults).
 */
export function parseConfig(doc: unknown, source = "config"): FlowConfig {
  const parsed = FlowConfigZ.safeParse(doc ?? {});
  if (!parsed.success) {
    throw new ConfigurationError({ message: `invalid configuration in ${source}`, issues: formatIssues(parsed.error) });
  }
  return parsed.data;
}

/**
 * Load YAML (default) or JSON configuration. Missing or malformed files are fatal at
 * startup, so this throws `ConfigurationError` rather than falling back.
 */
export async function loadConfig(filePath = defaultConfigPath()): Promise<FlowConfig> {
  let txt: string;
  try {
    txt = await readFile(filePath, "utf8");
  } catch (e) {
    throw new ConfigurationError({ message: `cannot read configuration ${filePath}: ${describeError(e)}` });
  }

  let doc: unknown;
  try {
    doc = path.extname(filePath).toLowerCase() === ".json" ? JSON.parse(txt) : parseYaml(txt);
  } catch (e) {
    throw new ConfigurationError({ message: `cannot parse configuration ${filePath}: ${describeError(e)}` });
  }
  return parseConfig(doc, filePath);
}
