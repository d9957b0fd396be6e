import type { HeaderEntry, MutationSet } from '../types/HeaderMutation';
import type { HeaderMap, HeaderMutation, HeaderValue, HeaderValueOption } from '../types/ExternalProcessing';

function headerValueAsString(header: HeaderValue): string {
  if (header.value) {
    return header.value;
  }
  if (header.raw_value && header.raw_value.length > 0) {
    return Buffer.from(header.raw_value).toString('utf8');
  }
  return '';
}

/**
 * Converts an Envoy header map into ordered entries. Envoy sends values in
 * `raw_value` on newer releases and in `value` on older ones.
 */
export function toHeaderEntries(map: HeaderMap | null | undefined): HeaderEntry[] {
  return (map?.headers ?? []).map((header) => ({ key: header.key, value: headerValueAsString(header) }));
}

/**
 * Folds an ordered mutation set into Envoy's HeaderMutation. Envoy applies
 * `remove_headers` before `set_headers`, so a remove drops every earlier set
 * entry for the same key to keep the in-order result.
 */
export function compileHeaderMutation(mutations: MutationSet): HeaderMutation {
  let setHeaders: HeaderValueOption[] = [];
  const removeHeaders: string[] = [];

  for (const mutation of mutations) {
    if (mutation.operation === 'remove') {
      const lower = mutation.key.toLowerCase();
      setHeaders = setHeaders.filter((option) => option.header.key.toLowerCase() !== lower);
      if (!removeHeaders.some((key) => key.toLowerCase() === lower)) {
        removeHeaders.push(mutation.key);
      }
      continue;
    }

    setHeaders.push({
      header: { key: mutation.header.key, value: mutation.header.value },
      append_action: mutation.operation === 'append' ? 'APPEND_IF_EXISTS_OR_ADD' : 'OVERWRITE_IF_EXISTS_OR_ADD',
    });
  }

  return { set_headers: setHeaders, remove_headers: removeHeaders };
}

/**
 * Applies a mutation set to a header list in order, the way the proxy will
 * see it after the compiled mutation is applied.
 */
export function applyMutations(headers: HeaderEntry[], mutations: MutationSet): HeaderEntry[] {
  let updated: HeaderEntry[] = headers.map((header) => ({ ...header }));

  for (const mutation of mutations) {
    if (mutation.operation === 'append') {
      updated.push({ ...mutation.header });
      continue;
    }

    const lower = mutation.operation === 'remove' ? mutation.key.toLowerCase() : mutation.header.key.toLowerCase();

    if (mutation.operation === 'overwrite') {
      const index = updated.findIndex((header) => header.key.toLowerCase() === lower);
      updated = updated.filter((header, i) => i === index || header.key.toLowerCase() !== lower);
      if (index === -1) {
        updated.push({ ...mutation.header });
      } else {
        // first occurrence keeps its position and received case
        updated[index] = { key: updated[index].key, value: mutation.header.value };
      }
      continue;
    }

    updated = updated.filter((header) => header.key.toLowerCase() !== lower);
  }

  return updated;
}
