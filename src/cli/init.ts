import inquirer from 'inquirer';
import * as fs from 'fs';
import * as path from 'path';
import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { writeFileIfChanged } from '../utils/files';
import { BOLD, CYAN, NC, YELLOW, header, info, success, warn } from '../utils/output';

interface EnvPrompt {
  label: string;
  secret?: boolean;
  validate?: (input: string) => boolean | string;
}

const KNOWN_VARS: Record<string, EnvPrompt> = {
  DOMAIN: {
    label: 'Domain served by the proxy (e.g. example.com)',
    validate: (input: string) => input.includes('.') || 'Enter a valid domain',
  },
  LETSENCRYPT_EMAIL: {
    label: 'Admin email (for Let\'s Encrypt notifications)',
    validate: (input: string) => input.includes('@') || 'Enter a valid email',
  },
  CLOUDFLARE_API_TOKEN: {
    label: 'Cloudflare API token (Zone.DNS edit)',
    secret: true,
  },
};

const SECRET_NAME = /TOKEN|SECRET|KEY|PASSWORD/;

function promptFor(name: string): EnvPrompt {
  return KNOWN_VARS[name] ?? { label: name, secret: SECRET_NAME.test(name) };
}

function quoteEnvValue(value: string): string {
  if (!/[\s#"'\\=]/.test(value)) return value;
  return value.includes("'") ? `"${value}"` : `'${value}'`;
}

/**
 * Serialize entries as a .env file, keeping their order.
 */
export function formatEnvFile(entries: ReadonlyArray<readonly [string, string]>): string {
  const lines = ['# Reverse proxy provisioning', '# Generated by caddy-provision init', ''];
  for (const [key, value] of entries) {
    lines.push(`${key}=${quoteEnvValue(value)}`);
  }
  lines.push('');
  return lines.join('\n');
}

/**
 * Merge prompted values into existing .env entries. Existing keys keep their
 * position; new keys are appended.
 */
export function mergeEnvEntries(existing: Record<string, string>, updates: Record<string, string>): Array<[string, string]> {
  const merged = new Map<string, string>(Object.entries(existing));
  for (const [key, value] of Object.entries(updates)) {
    merged.set(key, value);
  }
  return [...merged.entries()];
}

export async function runInit(): Promise<void> {
  const workDir = process.cwd();
  const envPath = path.join(workDir, '.env');
  const config = loadConfig(workDir);

  console.log('');
  console.log(`${BOLD}${CYAN}Reverse proxy setup${NC}`);
  console.log('');
  info('Collects the values needed to issue certificates via DNS-01.');

  const existing = fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath)) : {};

  header('Environment');

  const updates: Record<string, string> = {};
  for (const name of config.required_env) {
    const def = promptFor(name);
    const current = existing[name] || process.env[name];
    const validate = (input: string) => {
      // Blank secret keeps the current value
      if (!input && def.secret && current) return true;
      if (!input.trim()) return 'Required';
      return def.validate ? def.validate(input) : true;
    };

    const { value } = def.secret
      ? await inquirer.prompt<{ value: string }>([{
        type: 'password',
        name: 'value',
        message: current ? `${def.label} (leave blank to keep current):` : `${def.label}:`,
        mask: '*',
        validate,
      }])
      : await inquirer.prompt<{ value: string }>([{
        type: 'input',
        name: 'value',
        message: `${def.label}:`,
        default: current,
        validate,
      }]);
    updates[name] = value || current || '';
  }

  if (fs.existsSync(envPath)) {
    const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([{
      type: 'confirm',
      name: 'overwrite',
      message: '.env already exists. Update it?',
      default: true,
    }]);
    if (!overwrite) {
      warn('Skipped .env');
      console.log(`\n${YELLOW}Setup cancelled.${NC}\n`);
      return;
    }
  }

  const changed = writeFileIfChanged(envPath, formatEnvFile(mergeEnvEntries(existing, updates)), 0o600);
  if (changed) {
    success(`Wrote ${envPath}`);
  } else {
    info(`Unchanged ${envPath}`);
  }

  console.log('');
  info('Next: sudo caddy-provision provision');
  console.log('');
}
