export {
  AnnotationClient,
  AnnotationError,
  buildAnnotationPrompt,
  extractAnnotatedText,
  stripSurroundingQuotes,
} from "./annotationClient";
export type { AnnotationClientConfig } from "./annotationClient";
