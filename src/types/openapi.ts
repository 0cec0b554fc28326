/**
 * OpenAPI document shapes produced by the merger
 */

export type OpenApiOperation = Record<string, unknown>;

export type OpenApiPathItem = Record<string, OpenApiOperation>;

export type OpenApiPaths = Record<string, OpenApiPathItem>;

export interface OpenApiFragment {
  paths: OpenApiPaths;
}

export interface OpenApiInfo {
  title: string;
  version: string;
  description: string;
  'x-generated-at': string;
  'x-commit-reference': string | null;
  'x-repository-url': string | null;
}

export interface OpenApiDocument {
  openapi: '3.0.0';
  info: OpenApiInfo;
  servers: Array<{ url: string }>;
  paths: OpenApiPaths;
}
