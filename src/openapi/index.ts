export { normalizeRoute, pathParameterNames } from './normalize.js';
export { mergeFragment } from './merge.js';
export { postProcessDocument } from './post-process.js';
export { createDocument, type DocumentMetadata } from './document.js';
export {
  parseFragmentResponse,
  SkeletonFragmentGenerator,
  type FragmentGenerator,
  type FragmentRequest,
} from './generator.js';
