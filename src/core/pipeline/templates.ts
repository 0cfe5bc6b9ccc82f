/**
 * Bundled CloudFormation templates
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { ConfigError } from '../errors.js';
import type { DeploymentRequest, TemplateVariant } from '../../types/deployment.js';

export const TEMPLATE_FILES: Record<TemplateVariant, string> = {
  website: 'website-framework.yaml',
  'contact-form': 'website-contact-form.yaml',
};

/**
 * Find the templates/ directory shipped with the package.
 * Walks up from this module so it works from src/ and from the bundled dist/.
 */
export function findTemplatesDir(startDir: string = __dirname): string | null {
  let current = startDir;

  while (true) {
    const candidate = join(current, 'templates');
    if (existsSync(join(candidate, TEMPLATE_FILES.website))) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

/**
 * Absolute path of the template a request deploys
 */
export function resolveTemplatePath(template: DeploymentRequest['template']): string {
  if (template.path) {
    return resolve(template.path);
  }

  const templatesDir = findTemplatesDir();
  if (!templatesDir) {
    throw new ConfigError('Bundled templates directory not found; pass --template <path>');
  }

  return join(templatesDir, TEMPLATE_FILES[template.variant]);
}

/**
 * Read the template body
 *
 * @throws ConfigError when the file is missing or empty
 */
export async function loadTemplate(template: DeploymentRequest['template']): Promise<{ path: string; body: string }> {
  const path = resolveTemplatePath(template);

  let body: string;
  try {
    body = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read CloudFormation template ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (body.trim().length === 0) {
    throw new ConfigError(`CloudFormation template ${path} is empty`);
  }

  return { path, body };
}
