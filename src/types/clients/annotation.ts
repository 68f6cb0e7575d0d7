/**
 * Annotation API type definitions (Messages API subset)
 */

export type AnnotationContentBlock = {
  type: string;
  text?: string;
};

export type AnnotationResponse = {
  content: AnnotationContentBlock[];
};
