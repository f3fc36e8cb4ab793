/**
 * Chalk instance with colours switched off for non-TTY output, NO_COLOR and CI
 */

import { Chalk, type ChalkInstance } from 'chalk';

export function shouldDisableColors(env: NodeJS.ProcessEnv = process.env, isTTY = Boolean(process.stdout.isTTY)): boolean {
  // Piped output (e.g. a worker script reading JSON)
  if (!isTTY) {
    return true;
  }

  if (env.NO_COLOR) {
    return true;
  }

  if (env.FORCE_COLOR === '0' || env.FORCE_COLOR === 'false') {
    return true;
  }

  if (env.CI && !env.FORCE_COLOR) {
    return true;
  }

  return false;
}

const configuredChalk: ChalkInstance = new Chalk(shouldDisableColors() ? { level: 0 } : {});

export default configuredChalk;
