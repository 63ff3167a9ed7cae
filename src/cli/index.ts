#!/usr/bin/env node
/**
 * Command-line interface for generating and analyzing attack graphs.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { loadConfig, type EngineConfig } from '../core/config.js';
import { AttackGraphError } from '../core/errors.js';
import { LOG_LEVELS, setLogLevel, type LogLevel } from '../core/logger.js';
import { loadLanguageSpecification } from '../language/specification.js';
import { loadInstanceModel } from '../model/instance-model.js';
import { attachAttackers, buildAttackGraph } from '../graph/builder.js';
import type { AttackGraphNode } from '../graph/node.js';
import { calculateReachability } from '../analysis/reachability.js';
import { chainPattern } from '../analysis/patterns.js';
import { loadAttackGraph, saveAttackGraph } from '../storage/files.js';

interface CommonOptions {
  logLevel?: LogLevel;
}

interface GenerateOptions extends CommonOptions {
  output?: string;
  attackers: boolean;
  reachability?: boolean;
}

interface GraphOptions extends CommonOptions {
  model?: string;
}

interface ReachabilityOptions extends GraphOptions {
  attacker?: string;
}

interface FindOptions extends GraphOptions {
  json?: boolean;
}

const program = new Command();

const logLevelOption = () =>
  new Option('--log-level <level>', 'Log level').choices([...LOG_LEVELS]);

/**
 * Load config and apply the log level, the command line winning over the
 * config file.
 */
function setup(options: CommonOptions): EngineConfig {
  const config = loadConfig();
  setLogLevel(options.logLevel ?? config.logging.level);
  return config;
}

/**
 * Run a command body, turning engine errors into a red message and exit 1.
 */
function run(body: () => void): void {
  try {
    body();
  } catch (err) {
    if (err instanceof AttackGraphError) {
      console.error(chalk.red(`${err.name}: ${err.message}`));
      process.exit(1);
    }
    throw err;
  }
}

/**
 * Load a saved graph, re-attaching assets when a model is given.
 */
function openGraph(graphFile: string, options: GraphOptions) {
  const model = options.model ? loadInstanceModel(options.model) : undefined;
  return loadAttackGraph(graphFile, model);
}

function describeNode(node: AttackGraphNode): string {
  const flags: string[] = [];
  if (node.defenseStatus !== undefined) flags.push(`defense=${node.defenseStatus}`);
  if (node.existenceStatus !== undefined) flags.push(`exists=${node.existenceStatus}`);
  if (!node.isViable) flags.push('not viable');
  const suffix = flags.length > 0 ? chalk.gray(` [${flags.join(', ')}]`) : '';
  return `${chalk.cyan(node.fullName)} (${node.type})${suffix}`;
}

program
  .name('attackgraph')
  .description('Generate and analyze attack graphs from a language specification and a model')
  .version('0.1.0');

// Generate command
program
  .command('generate <model> <language>')
  .description('Generate an attack graph from an instance model and a compiled language')
  .option('-o, --output <file>', 'Output file (.json, .yml or .yaml)')
  .option('--no-attackers', 'Do not attach the model attackers')
  .option('-r, --reachability', 'Print what each attacker can reach')
  .addOption(logLevelOption())
  .action((modelFile: string, languageFile: string, options: GenerateOptions) => {
    run(() => {
      const config = setup(options);
      const language = loadLanguageSpecification(languageFile);
      const model = loadInstanceModel(modelFile);
      const graph = buildAttackGraph(language, model, {
        maxDepth: config.evaluation.maxExpressionDepth,
      });

      if (options.attackers) {
        attachAttackers(graph, model);
      }

      const output = options.output ?? config.output.attackGraphFile;
      saveAttackGraph(graph, output);
      console.log(chalk.green(`Generated ${graph.nodes.length} attack steps`));
      console.log(chalk.gray(`File: ${output}`));

      if (options.reachability) {
        calculateReachability(graph);
        for (const attacker of graph.attackers) {
          console.log(
            `${chalk.cyan(attacker.name)} reaches ${attacker.reachableAttackSteps.size} attack steps`
          );
        }
      }
    });
  });

// Reachability command
program
  .command('reachability <graph>')
  .description('List the attack steps each attacker in a saved graph can reach')
  .option('-m, --model <file>', 'Instance model to re-attach assets from')
  .option('-a, --attacker <name>', 'Only report this attacker')
  .addOption(logLevelOption())
  .action((graphFile: string, options: ReachabilityOptions) => {
    run(() => {
      setup(options);
      const graph = openGraph(graphFile, options);
      calculateReachability(graph);

      const attackers = graph.attackers.filter(
        (attacker) => !options.attacker || attacker.name === options.attacker
      );
      if (attackers.length === 0) {
        console.log(chalk.yellow('No attackers in graph'));
        return;
      }

      for (const attacker of attackers) {
        console.log(
          chalk.bold(`${attacker.name} (${attacker.reachableAttackSteps.size} reachable)`)
        );
        for (const node of attacker.reachableAttackSteps) {
          const marker = attacker.entryPoints.has(node) ? chalk.red('*') : ' ';
          console.log(`  ${marker} ${describeNode(node)}`);
        }
        console.log();
      }
    });
  });

// Get command
program
  .command('get <graph> <fullName>')
  .description('Show one attack step of a saved graph')
  .option('-m, --model <file>', 'Instance model to re-attach assets from')
  .addOption(logLevelOption())
  .action((graphFile: string, fullName: string, options: GraphOptions) => {
    run(() => {
      setup(options);
      const graph = openGraph(graphFile, options);
      const node = graph.getNodeByFullName(fullName);
      if (!node) {
        console.error(chalk.red(`Attack step not found: ${fullName}`));
        process.exit(1);
      }

      console.log(describeNode(node));
      console.log(chalk.gray(`Id: ${node.id}`));
      if (node.tags.size > 0) console.log(chalk.gray(`Tags: ${[...node.tags].join(', ')}`));
      if (node.mitreInfo) console.log(chalk.gray(`MITRE: ${node.mitreInfo}`));
      console.log();
      for (const parent of node.parents) console.log(`  ← ${parent.fullName}`);
      for (const child of node.children) console.log(`  → ${child.fullName}`);
      if (node.compromisedBy.size > 0) {
        const names = [...node.compromisedBy].map((attacker) => attacker.name);
        console.log(chalk.red(`Compromised by: ${names.join(', ')}`));
      }
    });
  });

// Find command
program
  .command('find <graph> <steps...>')
  .description('Find chains of attack steps by name; "*" stands for one or more steps')
  .option('-m, --model <file>', 'Instance model to re-attach assets from')
  .option('--json', 'Print the chains as JSON arrays of full names')
  .addOption(logLevelOption())
  .action((graphFile: string, steps: string[], options: FindOptions) => {
    run(() => {
      setup(options);
      const graph = openGraph(graphFile, options);
      const chains = chainPattern(steps).findMatches(graph);

      if (options.json) {
        console.log(
          JSON.stringify(
            chains.map((chain) => chain.map((node) => node.fullName)),
            null,
            2
          )
        );
        return;
      }

      if (chains.length === 0) {
        console.log(chalk.yellow('No matching chains'));
        return;
      }
      console.log(chalk.green(`Found ${chains.length} chains:\n`));
      for (const chain of chains) {
        console.log(chain.map((node) => chalk.cyan(node.fullName)).join(chalk.gray(' → ')));
      }
    });
  });

program.parse();
