export interface RepositoryRef {
  owner: string;
  name: string;
}

const REPO_RE = /^([A-Za-z0-9](?:[A-Za-z0-9-]{0,38}))\/([A-Za-z0-9._-]{1,100})$/;

/** Parses `owner/name`; a github.com URL is accepted as well. */
export function parseRepositoryRef(input: string): RepositoryRef | null {
  const trimmed = input
    .trim()
    .replace(/^https:\/\/github\.com\//, '')
    .replace(/\.git$/, '')
    .replace(/\/$/, '');
  const m = trimmed.match(REPO_RE);
  if (!m) return null;
  return { owner: m[1], name: m[2] };
}

export function formatRepositoryRef(ref: RepositoryRef): string {
  return `${ref.owner}/${ref.name}`;
}
