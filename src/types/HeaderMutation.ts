export type HeaderEntry = {
  key: string;
  value: string;
};

export type HeaderMutationOp =
  | {
      operation: 'append' | 'overwrite';
      header: HeaderEntry;
    }
  | {
      operation: 'remove';
      key: string;
    };

/**
 * Ordered list of header operations. Operations apply in sequence, so a later
 * `remove` cancels an earlier `append` of the same key.
 */
export type MutationSet = HeaderMutationOp[];

export type Outcome =
  | {
      kind: 'continue';
      mutations: MutationSet;
    }
  | {
      kind: 'terminal';
      statusCode: number;
      headers: HeaderEntry[];
      body: Buffer;
      details?: string;
    };

export type Directive = {
  addHeaders: Array<[string, string]>;
  removeHeaders: string[];
};
