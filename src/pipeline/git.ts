import { execFileSync } from 'node:child_process';

export interface GitMetadata {
  commit: string | null;
  repositoryUrl: string | null;
}

function git(root: string, args: string[]): string | null {
  try {
    const output = execFileSync('git', args, {
      cwd: root,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
    return output || null;
  } catch {
    return null;
  }
}

/**
 * `git@github.com:org/repo.git` → `https://github.com/org/repo`
 */
export function toBrowsableUrl(remote: string): string {
  let url = remote.trim();
  const ssh = url.match(/^[\w.-]+@([^:]+):(.+)$/);
  if (ssh) {
    url = `https://${ssh[1]}/${ssh[2]}`;
  } else if (url.startsWith('ssh://')) {
    url = `https://${url.slice('ssh://'.length).replace(/^[^@/]+@/, '')}`;
  }
  return url.replace(/\.git$/, '');
}

/**
 * HEAD commit and origin URL; null fields outside a repository or without git
 */
export function readGitMetadata(root: string): GitMetadata {
  const remote = git(root, ['config', '--get', 'remote.origin.url']);
  return {
    commit: git(root, ['rev-parse', 'HEAD']),
    repositoryUrl: remote ? toBrowsableUrl(remote) : null,
  };
}
