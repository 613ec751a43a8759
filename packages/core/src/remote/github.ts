import { ValidationError } from '../errors/catalog.js'

export interface GitHubRepoRef {
  owner: string
  repo: string
  ref?: string
  subdir?: string
}

/**
 * Parse a github.com URL. Accepted shapes:
 *
 *   https://github.com/owner/repo
 *   https://github.com/owner/repo/sub/dir          (extra segments are a subdir)
 *   https://github.com/owner/repo/tree/<ref>
 *   https://github.com/owner/repo/tree/<ref>/sub/dir
 *
 * An explicit ref overrides the one in the URL.
 */
export function parseGitHubUrl(repoUrl: string, explicitRef?: string): GitHubRepoRef {
  let url: URL
  try {
    url = new URL(repoUrl)
  } catch {
    throw new ValidationError(`Invalid repository URL: ${repoUrl}`, { url: repoUrl })
  }
  if (url.hostname.toLowerCase() !== 'github.com') {
    throw new ValidationError('Only github.com URLs are supported', { url: repoUrl })
  }

  const parts = url.pathname.split('/').filter(Boolean)
  if (parts.length < 2) {
    throw new ValidationError('Invalid GitHub URL: expected /owner/repo', { url: repoUrl })
  }
  const [owner, rawRepo, ...rest] = parts
  const repo = rawRepo.replace(/\.git$/, '')

  let ref: string | undefined
  let subdir: string | undefined
  if (rest[0] === 'tree') {
    ref = rest[1]
    subdir = rest.length > 2 ? rest.slice(2).join('/') : undefined
  } else if (rest.length > 0) {
    subdir = rest.join('/')
  }

  const finalRef = explicitRef || ref
  return {
    owner,
    repo,
    ...(finalRef ? { ref: finalRef } : {}),
    ...(subdir ? { subdir } : {}),
  }
}

export function tarballUrl(target: GitHubRepoRef): string {
  const base = `https://api.github.com/repos/${target.owner}/${target.repo}/tarball`
  return target.ref ? `${base}/${encodeURIComponent(target.ref)}` : base
}

export function cloneUrl(target: GitHubRepoRef): string {
  return `https://github.com/${target.owner}/${target.repo}.git`
}
