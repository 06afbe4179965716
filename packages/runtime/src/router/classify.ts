/** IUPAC nucleotide codes, including ambiguity codes. */
const SEQUENCE_RUN = /[ATCGURYKMSWBDHVN]{20,}/g;

export type RouteKind = 'analysis' | 'conversation';

export type MessageRoute =
  | { route: 'analysis'; sequence: string }
  | { route: 'conversation' };

/**
 * A message carrying a run of at least 20 nucleotide codes goes to the
 * analysis pipeline with the longest such run (the first on ties) as the
 * sequence. Everything else is conversation.
 */
export function classifyMessage(message: string): MessageRoute {
  let longest = '';
  for (const found of message.toUpperCase().matchAll(SEQUENCE_RUN)) {
    if (found[0].length > longest.length) longest = found[0];
  }
  return longest ? { route: 'analysis', sequence: longest } : { route: 'conversation' };
}
