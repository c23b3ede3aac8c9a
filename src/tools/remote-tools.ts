import { z } from 'zod';

import { ExternalServiceError, errorMessage } from '../errors.js';

import { defineTool } from './tool-factory.js';
import type { ToolSpec } from './types.js';

/**
 * Remote repository collaborator behind the search/listRepos/getFile tools.
 * Implementations may reject on network or auth failures; the tools turn
 * rejections into descriptive text.
 */
export interface RemoteRepositoryProvider {
  readonly name: string;
  search(query: string): Promise<string>;
  listRepos(username?: string): Promise<string>;
  getFile(repo: string, path: string, branch: string): Promise<string>;
}

const NOT_CONNECTED = 'no remote repository provider is connected';

/**
 * Default provider: answers every call with a note that nothing is connected.
 */
export class PlaceholderRepositoryProvider implements RemoteRepositoryProvider {
  readonly name = 'placeholder';

  async search(query: string): Promise<string> {
    return `Repository search for '${query}' is unavailable: ${NOT_CONNECTED}`;
  }

  async listRepos(username?: string): Promise<string> {
    if (username) {
      return `Repository listing for '${username}' is unavailable: ${NOT_CONNECTED}`;
    }
    return `Repository listing is unavailable: ${NOT_CONNECTED}`;
  }

  async getFile(repo: string, path: string, branch: string): Promise<string> {
    return `File '${path}' from '${repo}' (branch: ${branch}) is unavailable: ${NOT_CONNECTED}`;
  }
}

export const SearchParams = z.object({
  query: z.string().min(1).describe('Repository search query'),
});

export const ListReposParams = z.object({
  username: z.string().min(1).optional().describe('User or organization; omit for your own'),
});

export const GetFileParams = z.object({
  repo: z.string().min(1).describe('Repository in owner/name form'),
  path: z.string().min(1).describe('File path inside the repository'),
  branch: z.string().min(1).default('main'),
});

async function callProvider(
  provider: RemoteRepositoryProvider,
  call: () => Promise<string>,
): Promise<string> {
  try {
    return await call();
  } catch (error) {
    throw new ExternalServiceError(provider.name, errorMessage(error), { cause: error });
  }
}

export function createRemoteRepositoryTools(provider: RemoteRepositoryProvider): ToolSpec[] {
  return [
    defineTool({
      kind: 'remote-search',
      description: 'Search remote repositories',
      usage: 'search(query)',
      failurePrefix: 'Error searching repositories',
      parameters: SearchParams,
      execute: ({ query }) => callProvider(provider, () => provider.search(query)),
    }),
    defineTool({
      kind: 'remote-list',
      description: 'List repositories for a user or organization',
      usage: 'listRepos(username?)',
      failurePrefix: 'Error listing repositories',
      parameters: ListReposParams,
      execute: ({ username }) => callProvider(provider, () => provider.listRepos(username)),
    }),
    defineTool({
      kind: 'remote-get',
      description: 'Get file contents from a remote repository',
      usage: 'getFile(repo, path, branch = "main")',
      failurePrefix: 'Error getting repository file',
      parameters: GetFileParams,
      execute: ({ repo, path, branch }) =>
        callProvider(provider, () => provider.getFile(repo, path, branch)),
    }),
  ];
}
