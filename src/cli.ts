import { Command } from 'commander';

import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

export const program = new Command()
  .name('tracewright')
  .description(pkg.description)
  .version(pkg.version);

program
  .command('scan')
  .description('Detect metrics and tracing usage per language')
  .argument('[path]', 'Local working tree to scan', '.')
  .option('--repo <url>', 'Clone and scan a remote repository instead of a local path')
  .option('--ref <branch>', 'Branch or tag to clone (with --repo)')
  .option('--json', 'Print the scan result as JSON')
  .action(async (path: string, options: { repo?: string; ref?: string; json?: boolean }) => {
    const { scanCommand } = await import('./commands/scan.js');
    await scanCommand(path, options);
  });

program
  .command('plan')
  .description('Print the instrumentation plan for a language and mode')
  .requiredOption('--language <language>', 'go, python, java, nodejs, dotnet or rust')
  .requiredOption('--mode <mode>', 'metrics, traces, both or none')
  .option('--service <name>', 'Service name used in metric names and trace resources')
  .option('--path <dir>', 'Scan this tree first and target the detected files')
  .option('--json', 'Print the plan as JSON')
  .action(
    async (options: { language: string; mode: string; service?: string; path?: string; json?: boolean }) => {
      const { planCommand } = await import('./commands/plan.js');
      await planCommand(options);
    },
  );

program
  .command('apply')
  .description('Scan a working tree, then generate and apply the missing instrumentation')
  .argument('[path]', 'Working tree to modify', '.')
  .option('--mode <mode>', 'metrics, traces, both or none (prompted when omitted)')
  .option('--language <language>', 'Language to instrument when several are detected')
  .option('--service <name>', 'Override the service name')
  .option('--dry-run', 'Show the plan without writing files')
  .option('-y, --yes', 'Do not ask for confirmation')
  .action(
    async (
      path: string,
      options: { mode?: string; language?: string; service?: string; dryRun?: boolean; yes?: boolean },
    ) => {
      const { applyCommand } = await import('./commands/apply.js');
      await applyCommand(path, options);
    },
  );

program
  .command('toggle-spec')
  .description('Print the telemetry toggle document for a service')
  .requiredOption('--service <name>', 'Service name')
  .requiredOption('--mode <mode>', 'metrics, traces, both or none')
  .action(async (options: { service: string; mode: string }) => {
    const { toggleSpecCommand } = await import('./commands/toggle-spec.js');
    toggleSpecCommand(options);
  });

program
  .command('branches')
  .description('List the branches of a remote repository')
  .argument('<repo>', 'Clone URL')
  .option('--json', 'Print branch names as a JSON array')
  .action(async (repo: string, options: { json?: boolean }) => {
    const { branchesCommand } = await import('./commands/branches.js');
    await branchesCommand(repo, options);
  });
