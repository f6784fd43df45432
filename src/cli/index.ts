#!/usr/bin/env node
/**
 * crosscheck CLI
 * Creator / Reviewer / Critic feedback loop over coding-agent CLIs
 */

// Load environment variables (quiet mode to suppress logging)
import { config as loadDotenv } from 'dotenv';
loadDotenv({ quiet: true });

import { Command } from 'commander';
import { realpathSync } from 'fs';
import { createRequire } from 'module';
import * as pathModule from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { createDoctorCommand } from './commands/doctor.js';
import { createRunCommand, type RunCommandDeps } from './commands/run.js';
import { createShowCommand } from './commands/show.js';

// Read version from package.json - works from both src/ and dist/
const localRequire = createRequire(import.meta.url);
const currentDirPath = pathModule.dirname(fileURLToPath(import.meta.url));

function findPackageJson(): { version: string } {
  let dir = currentDirPath;
  for (let i = 0; i < 5; i++) {
    const pkgPath = pathModule.join(dir, 'package.json');
    try {
      const pkg: unknown = localRequire(pkgPath);
      if (
        pkg &&
        typeof pkg === 'object' &&
        'version' in pkg &&
        typeof pkg.version === 'string'
      ) {
        return { version: pkg.version };
      }
    } catch {
      // not at this level; keep walking up
    }
    dir = pathModule.dirname(dir);
  }
  return { version: '0.0.0' };
}
const VERSION = findPackageJson().version;

export function createProgram(deps: RunCommandDeps = {}): Command {
  const program = new Command();
  program
    .name('crosscheck')
    .description(
      'Creator builds, Reviewer reviews, Critic challenges the review; repeat.'
    )
    .version(VERSION)
    .addHelpText(
      'after',
      `
Examples:
  $ crosscheck "write a binary search function"
  $ crosscheck "implement quicksort" -n 2 -o quicksort.py
  $ crosscheck run "build a rate limiter" --creator gemini --reviewer claude --critic openai
  $ crosscheck doctor
  $ crosscheck show sessions/<id>.json`
    );

  program.addCommand(createRunCommand(deps), { isDefault: true });
  program.addCommand(
    createDoctorCommand({ locate: deps.locate, cwd: deps.cwd, env: deps.env })
  );
  program.addCommand(createShowCommand());
  return program;
}

const program = createProgram();

// Only parse when running as main module (not when imported for testing)
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return entry.endsWith('/crosscheck');
  }
}

if (isMainModule()) {
  await program.parseAsync();
}

export { program };
