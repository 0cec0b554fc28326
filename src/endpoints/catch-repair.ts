const OPTIONAL_CATCH_PATTERN = /\bcatch(\s*)\{/g;

export const CATCH_BINDING_NAME = '__unusedError';

/**
 * Give every parameterless `catch {` a throwaway binding. Whitespace between
 * the keyword and the brace is kept, so line numbers do not move.
 */
export function bindOptionalCatchClauses(source: string): { source: string; replaced: number } {
  let replaced = 0;
  const repaired = source.replace(OPTIONAL_CATCH_PATTERN, (_match, gap: string) => {
    replaced++;
    return `catch (${CATCH_BINDING_NAME})${gap}{`;
  });
  return { source: repaired, replaced };
}
