/**
 * Optional NLP annotation capability.
 *
 * The entity/phrase strategy only needs named entities and noun phrases.
 * Any backend that can produce them plugs in through TextAnnotator; the
 * extractor branches on `available`, never on which backend is behind it.
 *
 * @module skills/annotation
 */

export interface TextAnnotations {
  entities: readonly string[];
  nounPhrases: readonly string[];
}

export interface TextAnnotator {
  annotate(text: string): TextAnnotations;
}

export type AnnotationCapability =
  | { available: true; name: string; annotator: TextAnnotator }
  | { available: false; reason: string };

export const ANNOTATION_UNAVAILABLE: AnnotationCapability = {
  available: false,
  reason: 'no annotator configured'
};

/**
 * Wraps an optional annotator into a capability value.
 *
 * @example
 * const capability = annotationCapability(myAnnotator, 'rule-based');
 * if (capability.available) { ... }
 */
export function annotationCapability(
  annotator: TextAnnotator | null | undefined,
  name = 'custom'
): AnnotationCapability {
  if (!annotator) {
    return ANNOTATION_UNAVAILABLE;
  }

  return { available: true, name, annotator };
}
