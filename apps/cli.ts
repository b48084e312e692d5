#!/usr/bin/env node
/**
 * kube-secret-audit entry point
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { defaultDependencies, ExitCodes, runCli } from '../src/cli/cli';

// Handle both development (apps/) and production (dist/apps/) paths
const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../package.json')
  : join(__dirname, '../package.json');
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());
process.once('SIGTERM', () => controller.abort());

runCli(process.argv, { ...defaultDependencies(version), signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = ExitCodes.CLUSTER_ACCESS_FAILED;
  });
