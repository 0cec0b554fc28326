export { detectEndpoints, detectEndpointsInSource, parseForDetection, endpointKey, DETECTION_TIERS } from './detector.js';
export { combineRoutePaths, findControllerClasses, detectDecoratorEndpoints } from './decorator-tier.js';
export { detectCallEndpoints } from './call-tier.js';
export { detectTextEndpoints, findRouteCallsInText, findMatchingBrace, lineAt } from './text-tier.js';
export { bindOptionalCatchClauses, CATCH_BINDING_NAME } from './catch-repair.js';
export { findApiDefinitionFiles, containsApiDefinitions } from './candidate-files.js';
export { isRouteObjectName, toHttpMethod } from './route-object.js';
export type { DetectionContext, DetectionStrategy } from './types.js';
