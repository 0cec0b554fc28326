import type { OpenApiDocument } from '../types/index.js';

export interface DocumentMetadata {
  title: string;
  version: string;
  description: string;
  host: string;
  commit: string | null;
  repositoryUrl: string | null;
  generatedAt?: Date;
}

export function createDocument(meta: DocumentMetadata): OpenApiDocument {
  return {
    openapi: '3.0.0',
    info: {
      title: meta.title,
      version: meta.version,
      description: meta.description,
      'x-generated-at': (meta.generatedAt ?? new Date()).toISOString(),
      'x-commit-reference': meta.commit,
      'x-repository-url': meta.repositoryUrl,
    },
    servers: [{ url: meta.host }],
    paths: {},
  };
}
