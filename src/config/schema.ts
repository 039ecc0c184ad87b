import { z } from 'zod';

// Host paths the routine writes to
export const HostConfigSchema = z.object({
  bin_dir: z.string().default('/usr/local/bin').describe('Directory the proxy binary is installed into'),
  config_path: z.string().default('/etc/caddy/Caddyfile').describe('Absolute path of the rendered proxy configuration'),
  unit_dir: z.string().default('/etc/systemd/system').describe('systemd unit-definition directory'),
  unit_name: z.string().regex(/^[a-zA-Z0-9@._-]+$/, 'Must be a valid systemd unit name (without .service)').default('caddy').describe('Name of the generated systemd unit'),
});

// Proxy binary acquisition
export const ProxyConfigSchema = z.object({
  binary: z.string().default('caddy').describe('Executable name looked up on PATH and extracted from the archive'),
  download_url: z.string().url().default('https://caddyserver.com/api/download').describe('Build endpoint serving platform archives'),
  plugins: z.array(z.string()).default(['github.com/caddy-dns/cloudflare']).describe('Plugins bundled into the downloaded build'),
  download_timeout_ms: z.number().int().positive().default(120000).describe('Archive download timeout in milliseconds'),
});

// Templating utility
export const TemplatingConfigSchema = z.object({
  command: z.string().default('envsubst').describe('Templating executable required on the host'),
  package: z.string().default('gettext-base').describe('Package that provides the templating executable'),
  package_manager: z.string().default('apt-get').describe('Package manager used to install it'),
});

// systemd unit contents
export const UnitConfigSchema = z.object({
  description: z.string().min(1).default('Caddy web server').describe('Unit Description= line'),
  timeout_stop_sec: z.number().int().positive().finite().default(5).describe('TimeoutStopSec= bound in seconds'),
  limit_nofile: z.number().int().positive().default(1048576).describe('LimitNOFILE= open file ceiling'),
  restart: z.enum(['on-abnormal', 'on-failure']).default('on-abnormal').describe('Restart= policy (never restarts on clean exit)'),
});

export const DeployConfigSchema = z.object({
  command: z.string().default('./deploy.sh').describe('Deployment routine run after provisioning (relative to the working directory)'),
});

// Main provisioning configuration schema
export const ProvisionConfigSchema = z.object({
  template: z.string().default('Caddyfile').describe('Configuration template, relative to the working directory'),
  required_env: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a valid environment variable name'))
    .min(1)
    .default(['DOMAIN', 'LETSENCRYPT_EMAIL', 'CLOUDFLARE_API_TOKEN'])
    .describe('Environment variables that must be set before anything is installed'),
  host: HostConfigSchema.default({}).describe('Host filesystem layout'),
  proxy: ProxyConfigSchema.default({}).describe('Proxy binary download settings'),
  templating: TemplatingConfigSchema.default({}).describe('Templating utility installation'),
  unit: UnitConfigSchema.default({}).describe('Generated systemd unit'),
  deploy: DeployConfigSchema.default({}).describe('Deployment hand-off'),
});

// TypeScript types derived from schemas
export type HostConfig = z.infer<typeof HostConfigSchema>;
export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;
export type TemplatingConfig = z.infer<typeof TemplatingConfigSchema>;
export type UnitConfig = z.infer<typeof UnitConfigSchema>;
export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;
