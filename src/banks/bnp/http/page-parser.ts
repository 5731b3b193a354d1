/**
 * BNPNet Page Parser
 *
 * Reads portal pages with Cheerio: form discovery by name or position,
 * the values a browser would submit for a form, and hyperlink enumeration.
 */

import * as cheerio from 'cheerio';
import type { HttpMethod } from '../../../shared/utils/http-client.js';
import type { FormLocator } from '../types/index.js';

export interface HtmlForm {
  name?: string;
  /** Raw action attribute ('' when absent) */
  action: string;
  method: HttpMethod;
  /** Values the markup would submit as-is */
  fields: Record<string, string>;
}

export interface FormSubmission {
  url: string;
  method: HttpMethod;
  data: Record<string, string>;
}

const SKIPPED_INPUT_TYPES = new Set(['submit', 'image', 'button', 'reset', 'file']);

/**
 * Locate a form by its name attribute, or by zero-based position on the page
 */
export function findForm(html: string, locator: FormLocator): HtmlForm | null {
  const $ = cheerio.load(html);
  const form = 'name' in locator
    ? $('form').filter((_, el) => $(el).attr('name') === locator.name).first()
    : $('form').eq(locator.index);

  if (form.length === 0) {
    return null;
  }

  const fields: Record<string, string> = {};
  let submitButtonSeen = false;

  form.find('input, select, textarea').each((_, el) => {
    const $el = $(el);
    const name = $el.attr('name');
    if (!name || $el.attr('disabled') !== undefined) return;

    if ($el.is('select')) {
      const selected = $el.find('option[selected]').first();
      const option = selected.length > 0 ? selected : $el.find('option').first();
      if (option.length > 0) {
        fields[name] = option.attr('value') ?? option.text().trim();
      }
      return;
    }

    if ($el.is('textarea')) {
      fields[name] = $el.text();
      return;
    }

    const type = ($el.attr('type') ?? 'text').toLowerCase();

    if (type === 'checkbox' || type === 'radio') {
      if ($el.attr('checked') !== undefined) {
        fields[name] = $el.attr('value') ?? 'on';
      }
      return;
    }

    if (type === 'submit' || type === 'image') {
      // Browsers send the button that was clicked; take the first one
      if (!submitButtonSeen) {
        submitButtonSeen = true;
        fields[name] = $el.attr('value') ?? '';
      }
      return;
    }

    if (SKIPPED_INPUT_TYPES.has(type)) return;

    fields[name] = $el.attr('value') ?? '';
  });

  return {
    name: form.attr('name'),
    action: form.attr('action') ?? '',
    method: (form.attr('method') ?? 'get').toUpperCase() === 'POST' ? 'POST' : 'GET',
    fields
  };
}

/**
 * Combine a form's own values with the fields we fill in.
 * Filled-in fields win and are added even when the markup lacks them.
 */
export function buildFormSubmission(
  form: HtmlForm,
  pageUrl: string,
  values: Readonly<Record<string, string>>
): FormSubmission {
  const action = form.action.trim();
  return {
    url: action ? new URL(action, pageUrl).toString() : pageUrl,
    method: form.method,
    data: { ...form.fields, ...values }
  };
}

/**
 * Enumerate link targets in document order, resolved against the page URL.
 * Only http(s) targets are kept.
 */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];

  $('a[href], area[href], frame[src], iframe[src]').each((_, el) => {
    const target = ($(el).attr('href') ?? $(el).attr('src') ?? '').trim();
    if (!target || !URL.canParse(target, pageUrl)) return;

    const resolved = new URL(target, pageUrl);
    if (resolved.protocol === 'http:' || resolved.protocol === 'https:') {
      links.push(resolved.toString());
    }
  });

  return links;
}

/**
 * Keep links whose path ends with the given suffix, first occurrence only
 */
export function filterLinksBySuffix(links: readonly string[], suffix: string): string[] {
  const wanted = suffix.toLowerCase();
  const seen = new Set<string>();

  return links.filter((link) => {
    const path = new URL(link).pathname.toLowerCase();
    if (!path.endsWith(wanted) || seen.has(link)) return false;
    seen.add(link);
    return true;
  });
}

/**
 * The portal answers an export link with an HTML page when the account had
 * no operations over the requested period.
 */
export function isNoActivityBody(body: string): boolean {
  return /<html[\s>]/i.test(body);
}
