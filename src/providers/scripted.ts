/**
 * @fileoverview In-process round trip that replays a fixed script.
 *
 * Useful for examples, tests and offline demos: each call to `execute`
 * consumes the next entry, which is either a response, a thrown error, or a
 * function computing one from the request.
 */

import type {
  ProviderRequest,
  ProviderResponse,
  ProviderRoundTrip,
} from '../types/provider.types.js';

export type ScriptEntry =
  | ProviderResponse
  | { readonly error: unknown }
  | ((request: ProviderRequest) => ProviderResponse | Promise<ProviderResponse>);

export interface ScriptedRoundTrip extends ProviderRoundTrip {
  /** Every request received, in order */
  readonly requests: ReadonlyArray<ProviderRequest>;

  /** Entries not yet consumed */
  remaining(): number;
}

/**
 * Creates a round trip that answers from `script`.
 *
 * @throws Error from `execute` once the script is exhausted
 */
export function createScriptedRoundTrip(
  script: ReadonlyArray<ScriptEntry>,
  name: string = 'scripted',
): ScriptedRoundTrip {
  const queue = [...script];
  const requests: ProviderRequest[] = [];

  return {
    name,
    requests,
    remaining: () => queue.length,
    async execute(request: ProviderRequest): Promise<ProviderResponse> {
      requests.push(request);
      const entry = queue.shift();
      if (entry === undefined) {
        throw new Error(`Scripted round trip '${name}' has no response left for request #${requests.length}`);
      }
      if (typeof entry === 'function') {
        return entry(request);
      }
      if ('error' in entry) {
        throw entry.error;
      }
      return entry;
    },
  };
}
