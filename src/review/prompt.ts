import fs from "fs";
import path from "path";
import { TemplateError } from "../errors";
import type { ReviewMode } from "./types";

const DIFF_PLACEHOLDER = "[CODE_DIFF]";

/**
 * Locate the bundled prompts/ directory. Sources run from src/review/ and the
 * build runs from dist/src/review/, so walk up instead of using a fixed offset.
 */
function findPromptsDir(startDir: string = __dirname): string {
  let current = startDir;
  while (true) {
    const candidate = path.join(current, "prompts");
    if (fs.existsSync(path.join(current, "package.json")) && fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      throw new TemplateError(`Could not find the prompts directory above ${startDir}`);
    }
    current = parent;
  }
}

function templatePath(mode: ReviewMode, promptsDir: string = findPromptsDir()): string {
  return path.join(promptsDir, `${mode}.md`);
}

function loadTemplate(mode: ReviewMode, overridePath?: string): string {
  const file = overridePath ? path.resolve(overridePath) : templatePath(mode);
  if (!fs.existsSync(file)) {
    throw new TemplateError(`Prompt template not found: ${file}`);
  }
  return fs.readFileSync(file, "utf-8");
}

function renderPrompt(template: string, diff: string): string {
  if (!template.includes(DIFF_PLACEHOLDER)) {
    return `${template.trimEnd()}\n\n## Diff\n\n${diff}`;
  }
  // split/join rather than replace(): `$&` in a diff must stay literal
  return template.split(DIFF_PLACEHOLDER).join(diff);
}

export { DIFF_PLACEHOLDER, findPromptsDir, templatePath, loadTemplate, renderPrompt };
