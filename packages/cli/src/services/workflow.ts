/**
 * Publish Workflow Generator
 *
 * Builds the GitHub Actions workflow that runs `promptdeck publish`. The
 * workflow only runs on manual dispatch.
 */

import { existsSync, readFileSync } from 'node:fs';

import { PUBLISH_DEFAULTS } from '@promptdeck/config';
import { stringify as yamlStringify } from 'yaml';

export const DEFAULT_WORKFLOW_PATH = '.github/workflows/publish.yaml';
export const DEFAULT_REGISTRY_URL = 'https://registry.npmjs.org';

/**
 * GitHub Actions workflow step structure
 */
interface GitHubWorkflowStep {
  name?: string;
  uses?: string;
  with?: Record<string, string>;
  env?: Record<string, string>;
  run?: string;
}

interface GitHubWorkflowJob {
  'runs-on': string;
  permissions?: Record<string, string>;
  steps: GitHubWorkflowStep[];
}

interface GitHubWorkflow {
  name: string;
  on: Record<string, unknown>;
  jobs: Record<string, GitHubWorkflowJob>;
}

export interface PublishWorkflowOptions {
  /** Secret and environment variable holding the upload token (default: NPM_TOKEN) */
  tokenEnv?: string;
  /** Registry written to .npmrc by setup-node (default: https://registry.npmjs.org) */
  registryUrl?: string;
  /** Node.js version of the runner (default: 20) */
  nodeVersion?: string;
  /** Grant id-token: write for npm provenance (default: false) */
  provenance?: boolean;
}

/**
 * Generate the publish workflow YAML
 *
 * @example
 * writeFileSync('.github/workflows/publish.yaml', generatePublishWorkflow({ tokenEnv: 'NPM_TOKEN' }));
 */
export function generatePublishWorkflow(options: PublishWorkflowOptions = {}): string {
  const {
    tokenEnv = PUBLISH_DEFAULTS.TOKEN_ENV,
    registryUrl = DEFAULT_REGISTRY_URL,
    nodeVersion = '20',
    provenance = false,
  } = options;

  const job: GitHubWorkflowJob = {
    'runs-on': 'ubuntu-latest',
    steps: [
      { uses: 'actions/checkout@v4' },
      {
        name: 'Set up Node.js',
        uses: 'actions/setup-node@v4',
        with: {
          'node-version': nodeVersion,
          'registry-url': registryUrl,
        },
      },
      { name: 'Install dependencies', run: 'npm ci' },
      {
        name: 'Build and publish',
        env: { [tokenEnv]: `\${{ secrets.${tokenEnv} }}` },
        run: 'npx promptdeck publish',
      },
    ],
  };

  if (provenance) {
    job.permissions = { contents: 'read', 'id-token': 'write' };
  }

  const workflow: GitHubWorkflow = {
    name: 'Publish Package',
    // Manual trigger only
    on: { workflow_dispatch: {} },
    jobs: { publish: job },
  };

  const header = [
    '# Generated by promptdeck generate-workflow. Do not edit by hand.',
    '# Regenerate with: npx promptdeck generate-workflow',
    '',
  ].join('\n');

  return header + yamlStringify(workflow);
}

/**
 * Compare a workflow file with freshly generated content
 */
export function checkWorkflowSync(
  workflowPath: string,
  expected: string,
): { inSync: boolean; diff?: string } {
  if (!existsSync(workflowPath)) {
    return { inSync: false, diff: 'Workflow file does not exist - needs generation' };
  }

  const current = readFileSync(workflowPath, 'utf8').replaceAll('\r\n', '\n');
  if (current === expected.replaceAll('\r\n', '\n')) {
    return { inSync: true };
  }
  return { inSync: false, diff: 'Workflow file differs from the publish configuration' };
}
