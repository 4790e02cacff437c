#!/usr/bin/env node
import { Command } from 'commander';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { createOrchestrator } from '../bootstrap.js';
import { loadConfig } from '../config/index.js';
import { SecretFormatError, errorMessage } from '../core/errors.js';
import { parseCredentialPayload } from '../services/secretResolver.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('dbprobe')
    .description('Database connectivity probe (secret -> connect -> write/read/delete)')
    .version('0.1.0');

  program
    .command('run')
    .description('Run one probe invocation and print the response envelope')
    .option('--secret-id <id>', 'Secret identifier (overrides DB_SECRET_NAME)')
    .action(async (opts: { secretId?: string }) => {
      const cfg = loadConfig();
      if (opts.secretId) cfg.probe.secretId = opts.secretId;
      const envelope = await createOrchestrator(cfg).execute(
        {},
        { requestId: `cli-${Date.now()}` },
      );
      console.log(JSON.stringify(envelope, null, 2));
      if (envelope.statusCode !== 200) process.exitCode = 1;
    });

  program
    .command('check-secret')
    .requiredOption('--file <path>', 'JSON secret payload to validate')
    .description('Validate a secret payload offline; the password is never printed')
    .action((opts: { file: string }) => {
      const full = path.resolve(process.cwd(), opts.file);
      let text: string;
      try {
        text = fs.readFileSync(full, 'utf8');
      } catch (err) {
        console.error(`Cannot read ${full}: ${errorMessage(err)}`);
        process.exitCode = 2;
        return;
      }
      try {
        const credential = parseCredentialPayload(text);
        console.log(JSON.stringify({ ...credential, password: '***' }, null, 2));
      } catch (err) {
        if (!(err instanceof SecretFormatError)) throw err;
        console.error(err.message);
        process.exitCode = 2;
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const argvPath = process.argv[1];
  if (!argvPath || !fs.existsSync(argvPath)) return false;
  // bin shims are symlinks into dist/
  return fs.realpathSync(argvPath) === fs.realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err);
      process.exit(1);
    });
}
