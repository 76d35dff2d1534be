import { BODY_STORAGE_LIMIT, type Recipient } from './types.js';

export const TEMPLATE_PLACEHOLDERS = ['first_name', 'last_name', 'name', 'phone'] as const;

export type TemplatePlaceholder = (typeof TEMPLATE_PLACEHOLDERS)[number];

export type TemplateValues = Partial<Record<TemplatePlaceholder, string>>;

const RECOGNIZED = new Set<string>(TEMPLATE_PLACEHOLDERS);

// `{identifier}`; a lone brace never matches and stays literal text
const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const isPlaceholder = (name: string): name is TemplatePlaceholder => RECOGNIZED.has(name);

/**
 * Substitutes recognized placeholders in one pass over the template.
 *
 * Substituted values are never scanned again, so a value containing
 * `{last_name}` is emitted literally. Unrecognized placeholders are left
 * verbatim; recognized ones without a value become empty.
 */
export const renderTemplate = (template: string, values: TemplateValues): string =>
  template.replace(PLACEHOLDER_PATTERN, (token: string, name: string) =>
    isPlaceholder(name) ? (values[name] ?? '') : token
  );

/**
 * Template values for one recipient. `name` falls back to "first last".
 */
export const recipientTemplateValues = (recipient: Recipient): TemplateValues => {
  const firstName = recipient.firstName ?? '';
  const lastName = recipient.lastName ?? '';
  const name =
    recipient.name !== undefined && recipient.name.trim() !== ''
      ? recipient.name
      : `${firstName} ${lastName}`.trim();

  return {
    first_name: firstName,
    last_name: lastName,
    name,
    phone: recipient.phone,
  };
};

/**
 * Cuts a rendered body to the length kept in storage.
 */
export const truncateForStorage = (body: string): string => body.slice(0, BODY_STORAGE_LIMIT);
