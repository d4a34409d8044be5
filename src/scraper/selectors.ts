/**
 * Selectors locating the page tree in a documentation index page.
 *
 * The defaults target mdBook's rendered sidebar
 * (`<nav id="sidebar"> … <li class="chapter-item"><a href>`).  They can be
 * overridden via `ExportConfig.toc.selectors` for other generators.
 */

import type { Element } from 'hast';

// ── Default selector map ─────────────────────────────────────────────

export const defaultSelectors: TocSelectors = {
  /** Container holding the navigation lists. */
  sidebar: '#sidebar',

  /** One navigation entry; only entries holding a link become pages. */
  item: '.chapter-item',
};

export type TocSelectors = {
  sidebar: string;
  item: string;
};

/**
 * Merge a partial set of custom selectors with the defaults.
 */
export function mergeSelectors(custom: Partial<TocSelectors>): TocSelectors {
  return {
    sidebar: custom.sidebar ?? defaultSelectors.sidebar,
    item: custom.item ?? defaultSelectors.item,
  };
}

// ── Simplified CSS selector matching ─────────────────────────────────

export type ElementMatcher = (el: Element) => boolean;

/**
 * Compile a simple CSS selector into a HAST element matcher.
 *
 * Supports a tag name, `#id`, any number of `.class` and `[attr]` /
 * `[attr="value"]` parts, and comma-separated alternatives.  Combinators
 * (descendant, child) are not supported.
 */
export function parseCssSelector(selector: string): ElementMatcher {
  const parts = selector.split(',').map((s) => s.trim()).filter(Boolean);
  const matchers = parts.map(parseSingleSelector);
  return (el) => matchers.some((m) => m(el));
}

function parseSingleSelector(selector: string): ElementMatcher {
  const checks: ElementMatcher[] = [];
  let remaining = selector;

  const tagMatch = remaining.match(/^([a-zA-Z][a-zA-Z0-9-]*)/);
  if (tagMatch) {
    const tag = tagMatch[1].toLowerCase();
    checks.push((el) => el.tagName.toLowerCase() === tag);
    remaining = remaining.slice(tagMatch[0].length);
  }

  const tokenRe = /#([\w-]+)|\.([\w-]+)|\[([\w-]+)(?:="([^"]*)")?\]/g;
  let token: RegExpExecArray | null;
  while ((token = tokenRe.exec(remaining)) !== null) {
    const [, id, className, attrName, attrValue] = token;
    if (id !== undefined) {
      checks.push((el) => el.properties.id === id);
    } else if (className !== undefined) {
      checks.push((el) => getClasses(el).includes(className));
    } else if (attrName !== undefined) {
      checks.push((el) => {
        const value = getProperty(el, attrName);
        if (value === undefined) return false;
        return attrValue === undefined || value === attrValue;
      });
    }
  }

  if (checks.length === 0) {
    return () => false;
  }

  return (el) => checks.every((check) => check(el));
}

// ── Element helpers ──────────────────────────────────────────────────

export function getClasses(el: Element): string[] {
  const raw = el.properties.className;
  if (raw === undefined || raw === null) return [];
  if (Array.isArray(raw)) return raw.map(String);
  return String(raw).split(/\s+/).filter(Boolean);
}

/**
 * Read an attribute.  HAST keeps `data-*` / `aria-*` attributes camelCased
 * (`ariaLabel`), so both spellings are tried.
 */
export function getProperty(el: Element, name: string): string | undefined {
  const camel = name.replace(/-([a-z])/g, (_, c: string) => c.toUpperCase());
  const value = el.properties[name] ?? el.properties[camel];
  if (value === undefined || value === null || value === false) return undefined;
  return Array.isArray(value) ? value.join(' ') : String(value);
}
