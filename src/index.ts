import { run } from './cli';
import { createRuntime, type Runtime } from './runtime';
import { loadEnvFile, loadSettings } from './config/settings';

loadEnvFile();

let runtime: Runtime | undefined;

process.exitCode = await run(process.argv, {
  getRuntime: () => {
    runtime ??= createRuntime(loadSettings());
    return runtime;
  },
  cwd: () => process.cwd(),
});
