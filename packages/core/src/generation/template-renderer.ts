/**
 * Template Renderer
 *
 * Renders DAO and DTO modules from an EmissionModel.
 *
 * Flow:
 * 1. Render the caller's boilerplate against the model (if any)
 * 2. Render the DAO template with the boilerplate spliced in before the stream type
 * 3. Render the DTO template (only when model generation is configured)
 */

import Handlebars from 'handlebars';
import { TemplateError, createChildLogger } from '@cqlgen/shared';
import { DAO_TEMPLATE } from './templates/dao-template.js';
import { DTO_TEMPLATE } from './templates/dto-template.js';
import type { EmissionModel } from './types.js';

const logger = createChildLogger({ component: 'TemplateRenderer' });

// Isolated environment: no helpers or partials registered elsewhere leak in
const engine = Handlebars.create();

const COMPILE_OPTIONS = {
  strict: true,
  noEscape: true,
} as const;

/**
 * Compile and execute a template. Handlebars compiles lazily, so parse errors
 * surface on the first execution and are reported the same way as unresolved
 * references.
 */
export function renderTemplate(name: string, source: string, context: object, table: string): string {
  try {
    const template = engine.compile(source, COMPILE_OPTIONS);
    return template(context);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.error({ table, template: name, reason }, 'Template rendering failed');
    throw new TemplateError(`Failed to render ${name} template for table ${table}: ${reason}`, {
      table,
      artifact: name,
    });
  }
}

/**
 * Render the DAO module, splicing in the rendered boilerplate
 */
export function renderDao(model: EmissionModel, boilerplate = ''): string {
  const spliced =
    boilerplate.trim() === '' ? '' : renderTemplate('boilerplate', boilerplate, model, model.table).trimEnd();

  return renderTemplate('dao', DAO_TEMPLATE, { ...model, boilerplate: spliced }, model.table);
}

/**
 * Render the DTO module
 */
export function renderDto(model: EmissionModel): string {
  return renderTemplate('dto', DTO_TEMPLATE, model, model.table);
}
