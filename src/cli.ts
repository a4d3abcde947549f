#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from 'chalk';
import { createApp } from './app';
import { loadConfig } from './config/ConfigLoader';
import { RcaError, errorMessage, userMessageFor } from './errors';
import { resolveProviderOrder } from './llm/LLMGateway';
import { configureLogging, createLogger, isLogLevel } from './logging/Logger';
import { IntakeParser, IntakeRequest } from './orchestration/IntakeParser';
import { AnalysisRequest, EvidenceRef, OutcomeResult, RunStage, StructuredSection, TableContent } from './types';

const STAGE_LABELS: Record<RunStage, string> = {
  [RunStage.Collecting]: 'Collecting evidence',
  [RunStage.Prompting]: 'Assembling prompt',
  [RunStage.Invoking]: 'Waiting for the model',
  [RunStage.Parsing]: 'Parsing the reply',
  [RunStage.PostProcessing]: 'Follow-up actions',
  [RunStage.Done]: 'Done',
  [RunStage.Failed]: 'Failed'
};

function bootstrap(configPath: string | undefined, logLevel: string | undefined) {
  const config = loadConfig({ configPath });
  const level = logLevel ?? config.logging.level;
  configureLogging({ level: isLogLevel(level) ? level : config.logging.level });
  return createApp(config, createLogger('rca'));
}

function fail(error: unknown): void {
  if (error instanceof RcaError) {
    console.error(chalk.red(`\n✖ ${error.kind}: ${error.message}`));
    console.error(chalk.yellow(`  ${userMessageFor(error.kind)}`));
  } else {
    console.error(chalk.red(`\n✖ ${errorMessage(error)}`));
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
  }
  process.exitCode = 1;
}

function renderTable(table: TableContent): string {
  const widths = table.headers.map((h, i) => Math.max(h.length, ...table.rows.map((r) => r[i].length)));
  const line = (cells: string[]) => `| ${cells.map((c, i) => c.padEnd(widths[i])).join(' | ')} |`;
  return [
    chalk.bold(line(table.headers)),
    `|${widths.map((w) => '-'.repeat(w + 2)).join('|')}|`,
    ...table.rows.map(line)
  ].join('\n');
}

function renderSection(section: StructuredSection): string {
  const heading = chalk.bold.cyan(`\n## ${section.title}`);
  switch (section.kind) {
    case 'table':
      return `${heading}\n${section.tables.map(renderTable).join('\n\n')}`;
    case 'list':
      return `${heading}\n${section.items.map((item) => `  • ${item}`).join('\n')}`;
    case 'narrative':
      return `${heading}\n${section.content}`;
  }
}

function printOutcome(outcome: OutcomeResult): void {
  if (outcome.status === 'failure') {
    console.error(chalk.red(`\n✖ Analysis failed (${outcome.kind})`));
    console.error(chalk.gray(`  ${outcome.detail}`));
    console.error(chalk.yellow(`  ${userMessageFor(outcome.kind)}`));
    return;
  }

  const { result } = outcome;
  console.log(chalk.bold.green(`\n✔ Analysis complete`) + chalk.gray(` (provider: ${result.providerUsed}, run ${outcome.runId})`));
  if (result.sourcesUsed.length > 0) {
    console.log(chalk.gray(`  Sources: ${result.sourcesUsed.join(', ')}`));
  }

  for (const section of result.sections) {
    console.log(renderSection(section));
  }

  if (result.structuredFields) {
    console.log(chalk.bold.cyan('\n## Structured fields'));
    for (const [key, value] of Object.entries(result.structuredFields)) {
      const shown = typeof value === 'string' ? value : JSON.stringify(value);
      console.log(`${chalk.bold(key)}: ${shown.length > 200 ? `${shown.slice(0, 197)}...` : shown}`);
    }
  }

  for (const ticket of outcome.tickets) {
    console.log(chalk.green(`\n🎫 Created ${ticket.kind} ticket ${ticket.id}`));
  }

  const warnings = outcome.status === 'partial_failure' ? outcome.warnings : result.warnings;
  if (warnings.length > 0) {
    console.log(chalk.yellow(`\n⚠️  ${warnings.length} warning(s):`));
    warnings.forEach((w) => console.log(chalk.yellow(`   • ${w}`)));
  }
}

function refs(kind: EvidenceRef['kind'], values: string[] | undefined): EvidenceRef[] {
  return (values ?? []).map((identifier) => ({ kind, identifier }));
}

yargs(hideBin(process.argv))
  .scriptName('rca')
  .option('config', { type: 'string', alias: 'c', description: 'Path to rca.config.json' })
  .option('log-level', { type: 'string', description: 'debug | info | warn | error | silent' })
  .command(
    'analyze [description]',
    'Run a root cause analysis over files, URLs and tickets',
    (y) =>
      y
        .positional('description', { type: 'string', description: 'Free-text description of the issue' })
        .option('file', { type: 'string', array: true, alias: 'f', description: 'Evidence file (repeatable)' })
        .option('url', { type: 'string', array: true, alias: 'u', description: 'Evidence URL (repeatable)' })
        .option('ticket', { type: 'string', array: true, alias: 't', description: 'Ticket key used as evidence (repeatable)' })
        .option('intake', { type: 'string', description: 'Markdown intake file describing the request' })
        .option('template', { type: 'string', description: 'Analysis template id' })
        .option('provider', { type: 'string', alias: 'p', description: 'Preferred provider; the others remain as fallbacks' })
        .option('save', { type: 'boolean', default: false, description: 'Save the outcome under the output directory' })
        .option('json', { type: 'boolean', default: false, description: 'Print the outcome as JSON' }),
    async (argv) => {
      try {
        const app = bootstrap(argv.config, argv.logLevel);
        const intake: IntakeRequest | null = argv.intake ? await IntakeParser.load(argv.intake) : null;
        intake?.ignored.forEach((line) => console.warn(chalk.yellow(`Ignoring intake evidence line: ${line}`)));

        let providerPreference: string[] = intake?.providerPreference ?? [];
        if (argv.provider) {
          if (!app.config.providers[argv.provider]) {
            console.error(chalk.red(`Provider '${argv.provider}' is not configured (available: ${app.config.providerOrder.join(', ') || 'none'})`));
            process.exitCode = 1;
            return;
          }
          providerPreference = resolveProviderOrder(argv.provider, app.config.providerOrder);
        }

        const request: AnalysisRequest = {
          issueDescription: argv.description ?? intake?.issueDescription ?? '',
          evidence: [
            ...(intake?.evidence ?? []),
            ...refs('file', argv.file),
            ...refs('url', argv.url),
            ...refs('ticket', argv.ticket)
          ],
          templateId: argv.template ?? intake?.templateId ?? app.config.defaultTemplate,
          providerPreference
        };

        if (!argv.json) {
          console.log(chalk.bold.cyan('\n🔎 ROOT CAUSE ANALYSIS\n'));
          app.orchestrator.on('stage', (_runId, stage) => {
            if (stage !== RunStage.Done && stage !== RunStage.Failed) {
              console.log(chalk.gray(`→ ${STAGE_LABELS[stage]}...`));
            }
          });
        }

        const controller = new AbortController();
        const onInterrupt = () => {
          console.warn(chalk.yellow('\nCancelling after the current stage...'));
          controller.abort();
        };
        process.once('SIGINT', onInterrupt);
        const outcome = await app.orchestrator.run(request, { signal: controller.signal });
        process.removeListener('SIGINT', onInterrupt);

        if (argv.json) {
          console.log(JSON.stringify(outcome, null, 2));
        } else {
          printOutcome(outcome);
        }
        if (argv.save) {
          const saved = await app.reports.save(request, outcome);
          console.log(chalk.gray(`\nSaved report: ${saved}`));
        }
        if (outcome.status === 'failure') {
          process.exitCode = 1;
        }
      } catch (error) {
        fail(error);
      }
    }
  )
  .command(
    'templates',
    'List analysis templates',
    (y) => y,
    async (argv) => {
      try {
        const app = bootstrap(argv.config, argv.logLevel);
        const templates = await app.templates.list();
        console.log(chalk.bold.cyan(`\n📋 TEMPLATES (${templates.length})\n`));
        for (const t of templates) {
          const marker = t.id === app.config.defaultTemplate ? chalk.green(' (default)') : '';
          console.log(`${chalk.bold(t.id)}${marker}  ${t.name}`);
          console.log(chalk.gray(`   ${t.description}`));
        }
      } catch (error) {
        fail(error);
      }
    }
  )
  .command(
    'providers',
    'List configured LLM providers in fallback order',
    (y) => y,
    (argv) => {
      try {
        const { config } = bootstrap(argv.config, argv.logLevel);
        if (config.providerOrder.length === 0) {
          console.log(chalk.yellow('No providers configured. Set OPENAI_API_KEY, ANTHROPIC_API_KEY, OPENROUTER_API_KEY or LLMPROXY_API_KEY.'));
          return;
        }
        console.log(chalk.bold.cyan('\n🤖 PROVIDERS (fallback order)\n'));
        config.providerOrder.forEach((name, i) => {
          const p = config.providers[name];
          const endpoint = p.baseUrl ? chalk.gray(` @ ${p.baseUrl}`) : '';
          console.log(`${i + 1}. ${chalk.bold(name)} ${chalk.gray(`[${p.kind}]`)} ${p.model}${endpoint}`);
        });
      } catch (error) {
        fail(error);
      }
    }
  )
  .command(
    'reports',
    'List saved analysis reports',
    (y) => y,
    async (argv) => {
      try {
        const app = bootstrap(argv.config, argv.logLevel);
        const reports = await app.reports.list();
        if (reports.length === 0) {
          console.log(chalk.gray(`No saved reports in ${app.config.outputDir}`));
          return;
        }
        for (const r of reports) {
          const status = r.status === 'failure' ? chalk.red(r.status) : r.status === 'partial_failure' ? chalk.yellow(r.status) : chalk.green(r.status);
          console.log(`${chalk.bold(r.file)}  ${status}${r.providerUsed ? chalk.gray(` via ${r.providerUsed}`) : ''}`);
        }
      } catch (error) {
        fail(error);
      }
    }
  )
  .command(
    'report <ref>',
    'Show a saved report by file name or run id',
    (y) => y.positional('ref', { type: 'string', demandOption: true }),
    async (argv) => {
      try {
        const app = bootstrap(argv.config, argv.logLevel);
        const report = await app.reports.load(argv.ref);
        console.log(chalk.gray(`Saved ${report.savedAt}: ${report.request.issueDescription || '(no description)'}`));
        printOutcome(report.outcome);
      } catch (error) {
        fail(error);
      }
    }
  )
  .demandCommand(1)
  .strict()
  .parse();
