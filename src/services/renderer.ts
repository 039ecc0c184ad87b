import * as fs from 'fs';
import { RenderError, type Result, err, errorMessage, ok } from '../errors';
import { writeFileIfChanged } from '../utils/files';

/**
 * Placeholder forms, in match priority:
 *   {env.NAME}           Caddyfile runtime env
 *   {$NAME} {$NAME:def}  Caddyfile adapt-time env, optional default
 *   ${NAME}              envsubst
 *   $NAME                envsubst, upper-case names only
 *
 * Bare $name must be a whole upper-case word so bcrypt hashes
 * ($2a$14$Abc...) and regex anchors pass through untouched.
 */
const PLACEHOLDER =
  /\{env\.([A-Za-z_][A-Za-z0-9_]*)\}|\{\$([A-Za-z_][A-Za-z0-9_]*)(?::([^}]*))?\}|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Z_][A-Z0-9_]*)(?![A-Za-z0-9_])/g;

/** Rendered configuration holds the DNS credential, so only root may read it */
export const CONFIG_FILE_MODE = 0o600;

export interface RenderOutput {
  content: string;
  /** Placeholder names left in content, first occurrence order, no duplicates */
  unresolved: string[];
}

export interface RenderedConfig {
  path: string;
  changed: boolean;
}

/**
 * Substitute placeholders in a single pass; values are never re-expanded.
 * Unset or empty values leave the placeholder untouched and are reported.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string | undefined>>): RenderOutput {
  const unresolved: string[] = [];

  const content = template.replace(
    PLACEHOLDER,
    (
      match: string,
      envName: string | undefined,
      caddyName: string | undefined,
      caddyDefault: string | undefined,
      bracedName: string | undefined,
      bareName: string | undefined,
    ) => {
      const name = envName ?? caddyName ?? bracedName ?? bareName;
      if (name === undefined) return match;

      const value = values[name];
      if (value !== undefined && value !== '') return value;
      if (caddyDefault !== undefined) return caddyDefault;

      if (!unresolved.includes(name)) unresolved.push(name);
      return match;
    },
  );

  return { content, unresolved };
}

/**
 * Read a template and render it, failing on any unresolved placeholder.
 */
export function readAndRender(
  templatePath: string,
  values: Readonly<Record<string, string | undefined>>,
): Result<string, RenderError> {
  let template: string;
  try {
    template = fs.readFileSync(templatePath, 'utf-8');
  } catch (error) {
    return err(new RenderError(`Cannot read template ${templatePath}: ${errorMessage(error)}`, [], { cause: error }));
  }

  const { content, unresolved } = renderTemplate(template, values);
  if (unresolved.length > 0) {
    return err(new RenderError(
      `Template ${templatePath} references unset variables: ${unresolved.join(', ')}`,
      unresolved,
    ));
  }
  return ok(content);
}

/**
 * Render the template file into the live configuration path. Nothing is
 * written when a placeholder cannot be resolved.
 */
export function renderConfiguration(
  templatePath: string,
  outputPath: string,
  values: Readonly<Record<string, string | undefined>>,
): Result<RenderedConfig, RenderError> {
  const rendered = readAndRender(templatePath, values);
  if (!rendered.ok) return rendered;

  try {
    const changed = writeFileIfChanged(outputPath, rendered.value, CONFIG_FILE_MODE);
    return ok({ path: outputPath, changed });
  } catch (error) {
    return err(new RenderError(`Cannot write ${outputPath}: ${errorMessage(error)}`, [], { cause: error }));
  }
}
