import fs from "fs";
import path from "path";
import { ConfigurationError } from "../errors";
import { logger } from "../logger";

export type TemplateVariables = Record<string, string | number>;

export interface TemplateOptions {
  directory?: string;
}

export const DEFAULT_TEMPLATE = "default";
export const DEFAULT_TEMPLATE_DIR = path.resolve(__dirname, "..", "..", "prompts");

const TEMPLATE_NAME = /^[a-z0-9-]+$/;
const PLACEHOLDER = /\{([a-z_]+)\}/g;

export function loadTemplate(name: string, options: TemplateOptions = {}): string {
  if (!TEMPLATE_NAME.test(name)) {
    throw new ConfigurationError(`Invalid prompt template name '${name}'`);
  }

  const directory = options.directory || DEFAULT_TEMPLATE_DIR;
  const candidates = [name, DEFAULT_TEMPLATE].map((entry) => path.join(directory, `${entry}.txt`));
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw new ConfigurationError(`Prompt template '${name}' not found in ${directory}`);
  }

  logger.debug(`Using prompt template ${found}`);
  return fs.readFileSync(found, "utf-8");
}

export function renderTemplateText(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (_match, key: string) => {
    const value = variables[key];
    if (value === undefined) {
      throw new ConfigurationError(`Prompt template variable '${key}' has no value`);
    }
    return String(value);
  });
}

export function renderTemplate(name: string, variables: TemplateVariables, options: TemplateOptions = {}): string {
  return renderTemplateText(loadTemplate(name, options), variables);
}
