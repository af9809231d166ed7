/**
 * Placeholder substitution for license templates.
 *
 * Tokens are matched as literal, case-sensitive substrings. Tokens outside
 * these lists pass through untouched.
 */

export const YEAR_PLACEHOLDERS = ['[year]', '[yyyy]', '<year>', 'YEAR'] as const;

export const AUTHOR_PLACEHOLDERS = [
  '[fullname]',
  '[name of copyright owner]',
  '<copyright holders>',
  '<name of author>',
] as const;

export interface RenderValues {
  year: string;
  author: string;
}

function replaceAllLiteral(text: string, token: string, value: string): string {
  // split/join keeps `$` sequences in the value literal
  return text.split(token).join(value);
}

/**
 * Replace every year and author placeholder in a license template.
 */
export function renderLicense(template: string, values: RenderValues): string {
  let result = template;
  for (const token of YEAR_PLACEHOLDERS) {
    result = replaceAllLiteral(result, token, values.year);
  }
  for (const token of AUTHOR_PLACEHOLDERS) {
    result = replaceAllLiteral(result, token, values.author);
  }
  return result;
}
