import { createAppAuth } from '@octokit/auth-app';
import { Octokit } from '@octokit/rest';
import type { GitHubConfig } from '../config/index.js';
import { ConfigurationError } from '../errors/types.js';

export async function createInstallationClient(config: GitHubConfig, installationId: number): Promise<Octokit> {
  if (!config.appId || !config.privateKey) {
    throw new ConfigurationError('GitHub App credentials not configured', 'GITHUB_APP_ID');
  }

  const auth = createAppAuth({
    appId: config.appId,
    privateKey: config.privateKey,
  });

  const installationAuth = await auth({
    type: 'installation',
    installationId,
  });

  return new Octokit({
    auth: installationAuth.token,
  });
}
