import { validateEnvironment } from '../services/validator';
import { readAndRender, renderConfiguration } from '../services/renderer';
import { loadContext } from './context';
import { info, success } from '../utils/output';

/**
 * Render the configuration template without installing anything.
 *   --stdout   print the result instead of writing it
 */
export async function runRender(args: string[]): Promise<void> {
  const toStdout = args.includes('--stdout');
  const { config, host } = loadContext();

  const values = validateEnvironment(config.required_env, process.env);
  if (!values.ok) throw values.error;

  if (toStdout) {
    const content = readAndRender(host.templatePath, process.env);
    if (!content.ok) throw content.error;
    process.stdout.write(content.value);
    return;
  }

  const rendered = renderConfiguration(host.templatePath, host.configPath, process.env);
  if (!rendered.ok) throw rendered.error;

  if (rendered.value.changed) {
    success(`Rendered ${rendered.value.path}`);
  } else {
    info(`Unchanged ${rendered.value.path}`);
  }
}
