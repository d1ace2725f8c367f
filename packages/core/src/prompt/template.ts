/**
 * Template engine for generated prompts.
 *
 * Uses Handlebars for template rendering with custom helpers.
 */

import Handlebars from 'handlebars';

import { ConfigError, ConfigErrorCode, toError } from '../errors';

/**
 * Create a sandboxed Handlebars instance with custom helpers.
 * Using a separate instance prevents pollution of the global Handlebars.
 */
const handlebars = Handlebars.create();

handlebars.registerHelper('add', (a: unknown, b: unknown) => {
  const numA = Number(a);
  const numB = Number(b);
  if (Number.isNaN(numA) || Number.isNaN(numB)) {
    return NaN;
  }
  return numA + numB;
});

function wrapTemplateError(templateId: string, error: unknown): ConfigError {
  const cause = toError(error);
  return new ConfigError(`Template '${templateId}' failed: ${cause.message}`, {
    code: ConfigErrorCode.TEMPLATE_ERROR,
    cause,
    context: { templateId },
  });
}

/**
 * Compiles a Handlebars template string into a render function.
 *
 * Templates are strict (a missing variable is an error) and unescaped,
 * since the output is a prompt rather than HTML.
 *
 * @throws {ConfigError} TEMPLATE_ERROR if compilation or rendering fails
 *
 * @example
 * ```typescript
 * const render = compileTemplate<{ name: string }>('Hello, {{name}}!', 'greeting');
 * render({ name: 'World' });
 * // => 'Hello, World!'
 * ```
 */
export function compileTemplate<TInput>(
  template: string,
  templateId: string
): (input: TInput) => string {
  try {
    const compiled = handlebars.compile(template, {
      strict: true,
      noEscape: true,
    });

    return (input: TInput): string => {
      try {
        return compiled(input);
      } catch (error) {
        throw wrapTemplateError(templateId, error);
      }
    };
  } catch (error) {
    throw wrapTemplateError(templateId, error);
  }
}
