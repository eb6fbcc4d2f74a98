import { LabelTemplateError } from './errors';
import type { RouteMatch } from './types';

type TemplateToken =
  | { kind: 'text'; text: string }
  | { kind: 'param'; name: string; raw: string; optional: boolean };

export interface RouteLabelInput {
  /** Raw request path, used as-is when no route matched. */
  path: string;
  match?: RouteMatch;
  keepParams?: ReadonlySet<string>;
}

export interface CandidateLabels {
  /** Route template with allow-listed parameters filled in. */
  mixed: string;
  /** Route template when a route matched, raw path otherwise. */
  fallback: string;
  matched: boolean;
  templateError?: LabelTemplateError;
}

const PARAM_NAME = /[A-Za-z0-9_]/;

// Index just past the `)` closing the group opened at `start`.
const closeGroup = (template: string, start: number): number => {
  let depth = 0;
  for (let i = start; i < template.length; i++) {
    const char = template[i];
    if (char === '\\') {
      i++;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  throw new LabelTemplateError('unclosed "(" group', template);
};

/**
 * Splits a route template into literal text and placeholders.
 * Understands Express `:name(regex)?` tokens and `{name}` / `{name:regex}` tokens.
 */
export const parseRouteTemplate = (template: string): TemplateToken[] => {
  const tokens: TemplateToken[] = [];
  let text = '';
  let i = 0;

  const flushText = () => {
    if (text) tokens.push({ kind: 'text', text });
    text = '';
  };

  while (i < template.length) {
    const char = template[i];

    if (char === '{') {
      const end = template.indexOf('}', i);
      const inner = end === -1 ? '' : template.slice(i + 1, end);
      if (end === -1 || inner.includes('{')) throw new LabelTemplateError('unclosed "{" placeholder', template);
      const name = inner.split(':')[0];
      if (!name) throw new LabelTemplateError('empty "{}" placeholder', template);
      flushText();
      tokens.push({ kind: 'param', name, raw: template.slice(i, end + 1), optional: false });
      i = end + 1;
      continue;
    }

    if (char === '}') throw new LabelTemplateError('unmatched "}"', template);

    if (char === ':' && PARAM_NAME.test(template[i + 1] ?? '')) {
      let end = i + 1;
      while (end < template.length && PARAM_NAME.test(template[end])) end++;
      const name = template.slice(i + 1, end);
      if (template[end] === '(') end = closeGroup(template, end);
      let optional = false;
      if (template[end] === '?' || template[end] === '*') {
        optional = true;
        end++;
      } else if (template[end] === '+') {
        end++;
      }
      flushText();
      tokens.push({ kind: 'param', name, raw: template.slice(i, end), optional });
      i = end;
      continue;
    }

    text += char;
    i++;
  }

  flushText();
  return tokens;
};

/**
 * Rebuilds the template, writing the literal value for every parameter in
 * `keepParams` and the original placeholder for every other one.
 * Throws a LabelTemplateError when the template is malformed or a required
 * placeholder has no bound parameter.
 */
export const buildMixedLabel = (
  template: string,
  params: Readonly<Record<string, string | undefined>>,
  keepParams: ReadonlySet<string>,
): string => {
  let label = '';
  for (const token of parseRouteTemplate(template)) {
    if (token.kind === 'text') {
      label += token.text;
      continue;
    }
    const value = Object.prototype.hasOwnProperty.call(params, token.name) ? params[token.name] : undefined;
    if (value === undefined) {
      if (!token.optional) throw new LabelTemplateError(`no value bound for placeholder "${token.name}"`, template);
      label += token.raw;
      continue;
    }
    label += keepParams.has(token.name) ? value : token.raw;
  }
  return label;
};

const NO_PARAMS: ReadonlySet<string> = new Set();

/** Computes the mixed and fallback labels for a request. Pure: errors are returned, not logged. */
export const resolveCandidateLabels = ({ path, match, keepParams = NO_PARAMS }: RouteLabelInput): CandidateLabels => {
  if (!match) {
    return { mixed: path, fallback: path, matched: false };
  }

  if (match.literal) {
    return { mixed: match.pattern, fallback: match.pattern, matched: true };
  }

  try {
    return {
      mixed: buildMixedLabel(match.pattern, match.params, keepParams),
      fallback: match.pattern,
      matched: true,
    };
  } catch (err) {
    if (!(err instanceof LabelTemplateError)) throw err;
    return { mixed: match.pattern, fallback: match.pattern, matched: true, templateError: err };
  }
};

/**
 * Picks the label that is finally emitted.
 * A matched route answering 404/405 was rejected deeper in the stack, so its
 * template is used instead of the mixed label. Unmatched requests collapse to
 * the mask when one is configured.
 */
export const finalizeRouteLabel = (candidates: CandidateLabels, status: number, unmatchedMask: string | null): string => {
  let label = candidates.mixed;

  if (candidates.fallback !== candidates.mixed && (status === 404 || status === 405)) {
    label = candidates.fallback;
  }

  if (!candidates.matched && unmatchedMask !== null) {
    label = unmatchedMask;
  }

  return label;
};

export const resolveRouteLabel = (input: RouteLabelInput, status: number, unmatchedMask: string | null): string =>
  finalizeRouteLabel(resolveCandidateLabels(input), status, unmatchedMask);
