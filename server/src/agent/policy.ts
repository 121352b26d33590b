/**
 * Live-Data Policy
 *
 * Decides whether a question mentions a dynamic entity. Such questions may
 * not be answered before at least one tool call has succeeded.
 */

/** Decides whether `question` needs a live fetch, given the registered entity types. */
export type LiveDataDetector = (question: string, entities: string[]) => string[];

function singular(word: string): string {
  if (word.length > 4 && word.endsWith("ies")) return `${word.slice(0, -3)}y`;
  if (word.length > 3 && word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1);
  return word;
}

/**
 * Default detector: whole-word match of any entity type, ignoring case
 * and simple plurals. Returns the entity types mentioned.
 */
export const mentionedEntities: LiveDataDetector = (question, entities) => {
  const words = new Set((question.toLowerCase().match(/[a-z0-9_]+/g) ?? []).map(singular));
  return entities.filter(entity => words.has(singular(entity.toLowerCase())));
};
