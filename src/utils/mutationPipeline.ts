import type { HeaderEntry, MutationSet, Outcome } from '../types/HeaderMutation';
import type { PathCondition, PathGateRule, PathHeaderRule } from '../types/RequestHeaderRule';
import { directiveToMutations, parseDirective } from './directiveDecoder';
import logger from './logger';

export const PATH_PSEUDO_HEADER = ':path';

export type PipelineSettings = {
  stampHeader: HeaderEntry;
  directiveHeaderName: string;
  stripDirectiveHeader: boolean;
};

// Evaluated independently, appended in this order.
export const PATH_HEADER_RULES: readonly PathHeaderRule[] = [
  { condition: 'path', includes: '/api/v1', header: { key: 'x-api-version', value: 'v1' } },
  { condition: 'path', includes: '/admin', header: { key: 'x-admin-access', value: 'true' } },
];

export const AUTHORIZATION_GATE: PathGateRule = {
  condition: 'path',
  includes: '/protected',
  requiredHeader: 'authorization',
  reject: {
    statusCode: 401,
    contentType: 'application/json',
    body: JSON.stringify({ error: 'Authorization required' }),
    details: 'authorization_required',
  },
};

export type ExtractedAttributes = {
  directive?: string;
  path: string;
  authorizationPresent: boolean;
};

/**
 * Single pass over the headers. Every occurrence is visited so the last one
 * wins when a name repeats.
 */
export function extractAttributes(headers: HeaderEntry[], directiveHeaderName: string): ExtractedAttributes {
  const directiveKey = directiveHeaderName.toLowerCase();
  const authorizationKey = AUTHORIZATION_GATE.requiredHeader.toLowerCase();
  const extracted: ExtractedAttributes = { path: '', authorizationPresent: false };

  for (const { key, value } of headers) {
    const lower = key.toLowerCase();
    if (lower === directiveKey) {
      extracted.directive = value;
    }
    if (lower === PATH_PSEUDO_HEADER) {
      extracted.path = value;
    }
    if (lower === authorizationKey) {
      extracted.authorizationPresent = true;
    }
  }

  return extracted;
}

function matchesPath(path: string, rule: PathCondition): boolean {
  return path.includes(rule.includes);
}

/**
 * Runs the header rules for one request: stamp, extraction, path rules,
 * authorization gate and finally the directive carried in a request header.
 * Only the gate can end evaluation early, and when it does the mutations
 * computed before it are discarded.
 */
export function runMutationPipeline(headers: HeaderEntry[], settings: PipelineSettings): Outcome {
  const mutations: MutationSet = [{ operation: 'append', header: { ...settings.stampHeader } }];

  const { directive, path, authorizationPresent } = extractAttributes(headers, settings.directiveHeaderName);

  for (const rule of PATH_HEADER_RULES) {
    if (matchesPath(path, rule)) {
      mutations.push({ operation: 'append', header: { ...rule.header } });
    }
  }

  if (matchesPath(path, AUTHORIZATION_GATE) && !authorizationPresent) {
    const { reject } = AUTHORIZATION_GATE;
    return {
      kind: 'terminal',
      statusCode: reject.statusCode,
      headers: [{ key: 'content-type', value: reject.contentType }],
      body: Buffer.from(reject.body, 'utf8'),
      details: reject.details,
    };
  }

  if (directive) {
    const result = parseDirective(directive);
    if (result.ok) {
      mutations.push(...directiveToMutations(result.directive));
      if (settings.stripDirectiveHeader) {
        mutations.push({ operation: 'remove', key: settings.directiveHeaderName });
      }
    } else {
      logger.debug({ event: 'DIRECTIVE_REJECTED', message: result.reason });
    }
  }

  return { kind: 'continue', mutations };
}
