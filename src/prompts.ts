import fs from "node:fs";
import path from "node:path";

function loadPrompt(name: string) {
  const file = path.resolve(__dirname, "..", "prompts", `${name}.md`);
  return fs.readFileSync(file, "utf8");
}

export const prompts = {
  webAnalyst: loadPrompt("web-analyst"),
  answer: loadPrompt("answer"),
  entityExtractor: loadPrompt("entity-extractor"),
  visualizer: loadPrompt("visualizer"),
};

export function fillPrompt(template: string, values: Record<string, string>) {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) => values[key] ?? match);
}
