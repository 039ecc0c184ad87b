import * as fs from 'fs';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { renderTemplate } from '../src/services/renderer';
import { TEST_ENV } from './helpers';

const template = fs.readFileSync(path.join(__dirname, '..', 'Caddyfile'), 'utf-8');

describe('shipped Caddyfile template', () => {
  it('issues certificates through the Cloudflare DNS challenge', () => {
    expect(template).toContain('dns cloudflare');
  });

  it('renders completely from the required variables', () => {
    const { content, unresolved } = renderTemplate(template, TEST_ENV);

    expect(unresolved).toEqual([]);
    expect(content).toBe(
      '{\n\temail ops@example.com\n}\n\nexample.com {\n\ttls {\n\t\tdns cloudflare tok123\n\t}\n\n\tencode zstd gzip\n\treverse_proxy 127.0.0.1:8000\n}\n',
    );
  });
});
