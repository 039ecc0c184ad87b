#!/usr/bin/env node
import { runInit } from './cli/init';
import { runProvision, runInstall } from './cli/provision';
import { runRender } from './cli/render';
import { runUnit } from './cli/unit';
import { runStatus } from './cli/status';
import { VERSION } from './version';

const command = process.argv[2];
const args = process.argv.slice(3);

const run = (fn: (args: string[]) => Promise<void>) =>
  fn(args).catch((err: Error) => {
    console.error(`\n\x1b[31mError:\x1b[0m ${err.message}\n`);
    process.exit(1);
  });

switch (command) {
  case 'init':
    run(() => runInit());
    break;

  case 'provision':
    run(() => runProvision());
    break;

  case 'install':
    run(runInstall);
    break;

  case 'render':
    run(runRender);
    break;

  case 'unit':
    run(runUnit);
    break;

  case 'status':
    run(() => runStatus());
    break;

  case '--version':
  case '-v':
    console.log(VERSION);
    break;

  case undefined:
  case '--help':
  case '-h':
    console.log('');
    console.log(`  \x1b[1mcaddy-provision\x1b[0m v${VERSION}`);
    console.log('');
    console.log('  Usage: caddy-provision <command>');
    console.log('');
    console.log('  Commands:');
    console.log('    init                    Collect domain, email and DNS token into .env');
    console.log('    provision               Install, configure and (re)start the TLS proxy');
    console.log('    install [args...]       Provision, then run the deploy command with args');
    console.log('    render [--stdout]       Render the configuration template only');
    console.log('    unit [--print]          Write the systemd unit only');
    console.log('    status                  Show proxy, configuration and unit state');
    console.log('');
    console.log('  Environment:');
    console.log('    DOMAIN                  Domain the proxy serves');
    console.log('    LETSENCRYPT_EMAIL       ACME account email');
    console.log('    CLOUDFLARE_API_TOKEN    Token for the DNS-01 challenge');
    console.log('    PROVISION_CONFIG        Path to provision.yaml (default ./provision.yaml)');
    console.log('');
    break;

  default:
    console.error(`Unknown command: ${command}`);
    console.error('Run "caddy-provision --help" for usage.');
    process.exit(1);
}
