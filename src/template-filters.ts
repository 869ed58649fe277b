import type {
  TemplateFilterHandler,
  TplFilter,
  TplFilterArg,
} from './types.js';

import { tplStringify } from './template-runtime.js';

/**
 * Internal registry for template filters.
 */
const templateFilterRegistry = new Map<string, TemplateFilterHandler>();

/**
 * Register (or override) a template filter.
 *
 * Unknown filters referenced in templates are ignored at render time.
 *
 * @param name - Filter name (must match `/^[a-z][\w]*$/`).
 * @param handler - Function that receives the current value and optional arguments.
 */
export const registerTemplateFilter = (name: string, handler: TemplateFilterHandler): void => {
  if (!/^[a-z][\w]*$/.test(name)) {
    throw new TypeError(`Invalid filter name: ${name}`);
  }
  if (typeof handler !== 'function') {
    throw new TypeError('Filter handler must be a function');
  }
  templateFilterRegistry.set(name, handler);
};

/**
 * Apply a filter pipeline (left-to-right). Unknown filter names are skipped.
 *
 * @param value - Input value.
 * @param filters - Filter pipeline as parsed from the template.
 * @returns Transformed value.
 */
export const applyTemplateFilters = (value: unknown, filters: TplFilter[] | undefined): unknown => {
  let val = value;
  if (!filters) return val;
  for (const f of filters) {
    const handler = templateFilterRegistry.get(f.name);
    if (handler) val = handler(val, f.args);
  }
  return val;
};

const argString = (args: TplFilterArg[] | undefined, i: number): string => {
  return (args && args.length > i) ? tplStringify(args[i]) : '';
};

/*
 * Built-in filters.
 */
registerTemplateFilter('upper', (val) => tplStringify(val).toUpperCase());
registerTemplateFilter('lower', (val) => tplStringify(val).toLowerCase());
registerTemplateFilter('trim', (val) => tplStringify(val).trim());
registerTemplateFilter('json', (val) => JSON.stringify(val) ?? '');
registerTemplateFilter('urlencode', (val) => encodeURIComponent(tplStringify(val)));
registerTemplateFilter('replace', (val, args) => {
  // literal, global replacement; empty `from` is a no-op
  const from = argString(args, 0);
  const src = tplStringify(val);
  return from === '' ? src : src.split(from).join(argString(args, 1));
});
