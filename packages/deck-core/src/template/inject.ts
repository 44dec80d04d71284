/**
 * TemplateInjector - literal placeholder substitution
 */

import { createDeckError } from '../error/deck-error.js';

const TITLE_PLACEHOLDER = /\{\{\s*slide_title\s*\}\}/;
const SLIDES_PLACEHOLDER = /\{\{\s*slides\s*\}\}/;
const ANY_PLACEHOLDER = /\{\{\s*(slide_title|slides)\s*\}\}/g;

export interface TemplateValues {
  title: string;
  slides: string;
}

export interface PlaceholderReport {
  title: boolean;
  slides: boolean;
}

/**
 * Which placeholders a template carries
 */
export function inspectTemplate(template: string): PlaceholderReport {
  return {
    title: TITLE_PLACEHOLDER.test(template),
    slides: SLIDES_PLACEHOLDER.test(template),
  };
}

/**
 * Throws DECK_TEMPLATE_MISSING_PLACEHOLDER when the slides placeholder is absent
 */
export function assertTemplatePlaceholders(template: string, templatePath?: string): PlaceholderReport {
  const report = inspectTemplate(template);
  if (!report.slides) {
    throw createDeckError(
      'DECK_TEMPLATE_MISSING_PLACEHOLDER',
      `Template ${templatePath ?? '(inline)'} has no {{ slides }} placeholder`,
      { path: templatePath }
    );
  }
  return report;
}

/**
 * Replace every placeholder occurrence in one pass. Values are inserted
 * verbatim and never rescanned for placeholders.
 */
export function injectTemplate(template: string, values: TemplateValues, templatePath?: string): string {
  assertTemplatePlaceholders(template, templatePath);
  return template.replace(ANY_PLACEHOLDER, (_match, name: string) =>
    name === 'slides' ? values.slides : values.title
  );
}
