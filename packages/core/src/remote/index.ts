export { cloneUrl, parseGitHubUrl, tarballUrl } from './github.js'
export type { GitHubRepoRef } from './github.js'
export { fetchRepoCheckout, withRepoCheckout } from './checkout.js'
export type { CheckoutMethod, FetchRepoOptions, RepoCheckout } from './checkout.js'
