import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// src/help (or dist/help once built) sits two levels below the package root.
export const DEFAULT_HELP_TEMPLATE_PATH = path.resolve(__dirname, "../..", "config", "help.txt.hbs");

export interface HelpContext {
  locale: string;
  defaultScale: "Celsius" | "Fahrenheit";
}

export interface HelpTemplate {
  path: string;
  render: (context: HelpContext) => string;
}

export function loadHelpTemplate(templatePath: string = DEFAULT_HELP_TEMPLATE_PATH): HelpTemplate {
  const resolvedPath = path.resolve(templatePath);

  let templateSource: string;
  try {
    templateSource = fs.readFileSync(resolvedPath, "utf-8");
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new Error(`Failed to read help template at ${resolvedPath}: ${message}`, { cause: e });
  }

  const compiled = Handlebars.compile<HelpContext>(templateSource, { noEscape: true, strict: true });

  return {
    path: resolvedPath,
    render: (context: HelpContext) => compiled(context)
  };
}
