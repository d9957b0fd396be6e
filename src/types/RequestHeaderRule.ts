import type { HeaderEntry } from './HeaderMutation';

export type PathCondition = {
  condition: 'path';
  includes: string;
};

/** Appends `header` when the request path contains `includes`. */
export type PathHeaderRule = PathCondition & {
  header: HeaderEntry;
};

/** Rejects the request when the path matches and `requiredHeader` is absent. */
export type PathGateRule = PathCondition & {
  requiredHeader: string;
  reject: {
    statusCode: number;
    contentType: string;
    body: string;
    details?: string;
  };
};
