import path from "node:path";
import { fileURLToPath } from "node:url";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { findPackageRoot } from "./config-discovery.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type TemplateName = "run-summary";

// =============================================================================
// PUBLIC API
// =============================================================================

export async function renderTemplate(name: TemplateName, values: object): Promise<string> {
  const template = await loadTemplate(name);

  try {
    return template(values).trimEnd();
  } catch (err) {
    throw new UserFacingError({
      code: TEMPLATE_ERROR_CODE,
      title: "Template failed to render.",
      message: `Template "${name}" could not be rendered.`,
      hint: "Provide values for all placeholders used by the template.",
      cause: err,
    });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

const TEMPLATE_CACHE = new Map<TemplateName, Handlebars.TemplateDelegate>();
const TEMPLATE_ERROR_CODE = USER_FACING_ERROR_CODES.template;

async function loadTemplate(name: TemplateName): Promise<Handlebars.TemplateDelegate> {
  const cached = TEMPLATE_CACHE.get(name);
  if (cached) return cached;

  const templatePath = resolveTemplatePath(name);
  if (!(await fse.pathExists(templatePath))) {
    throw new UserFacingError({
      code: TEMPLATE_ERROR_CODE,
      title: "Template missing.",
      message: `Template "${name}" not found at ${templatePath}.`,
      hint: "Ensure the templates directory ships next to package.json.",
    });
  }

  const raw = await fse.readFile(templatePath, "utf8");

  let compiled: Handlebars.TemplateDelegate;
  try {
    compiled = Handlebars.compile(raw, { noEscape: true, strict: true });
  } catch (err) {
    throw new UserFacingError({
      code: TEMPLATE_ERROR_CODE,
      title: "Template invalid.",
      message: `Template "${name}" failed to compile.`,
      hint: "Check the template syntax for errors.",
      cause: err,
    });
  }

  TEMPLATE_CACHE.set(name, compiled);
  return compiled;
}

// Walk upward from this module so compiled builds under dist/ resolve the same directory.
function resolveTemplatePath(name: TemplateName): string {
  const moduleDir = fileURLToPath(new URL(".", import.meta.url));
  const packageRoot = findPackageRoot(moduleDir);
  if (!packageRoot) {
    throw new UserFacingError({
      code: TEMPLATE_ERROR_CODE,
      title: "Templates unavailable.",
      message: `package.json not found while resolving templates from ${moduleDir}.`,
    });
  }
  return path.join(packageRoot, "templates", `${name}.hbs`);
}
