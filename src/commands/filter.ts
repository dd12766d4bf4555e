/**
 * filter command - check and explain filter expressions without touching data
 */

import { Command } from 'commander';
import {
  OPERATORS_BY_KIND,
  collectFields,
  countClauses,
  formatFilter,
  parseFilter,
  suggestFields,
  type FilterExpression,
} from '../filter/index.js';
import { getOutputOptions, output, outputSuccess, outputTable } from '../utils/output.js';
import { bold, dim } from '../utils/formatters.js';
import { exitWithError, loadConfig, QueryError, type CliContext } from './shared.js';

/**
 * Indented outline of an expression tree, one node per line
 */
export function renderTree(expr: FilterExpression, indent: string = ''): string[] {
  switch (expr.type) {
    case 'and':
    case 'or':
      return [
        `${indent}${expr.type.toUpperCase()}`,
        ...renderTree(expr.left, indent + '  '),
        ...renderTree(expr.right, indent + '  '),
      ];
    case 'not':
      return [`${indent}NOT`, ...renderTree(expr.operand, indent + '  ')];
    case 'comparison':
      return [`${indent}${formatFilter(expr)}`];
  }
}

async function maxDepthFor(ctx: CliContext): Promise<number> {
  const config = await loadConfig(ctx);
  return config.filter.maxDepth;
}

export function createFilterCommand(ctx: CliContext): Command {
  const cmd = new Command('filter').description('Check and explain filter expressions');

  cmd
    .command('check')
    .description('Validate a filter expression')
    .argument('<query>', 'Filter expression')
    .action(async (query: string) => {
      try {
        const result = parseFilter(query, { maxDepth: await maxDepthFor(ctx) });
        if (!result.ok) {
          if (getOutputOptions().json) {
            output({
              valid: false,
              error: { code: result.error.code, message: result.error.message, position: result.error.position ?? null },
            });
            process.exit(1);
          }
          exitWithError('filter check', new QueryError(query, result.error));
        }
        outputSuccess('Valid filter', { valid: true, canonical: formatFilter(result.ast) });
      } catch (error) {
        exitWithError('filter check', error);
      }
    });

  cmd
    .command('explain')
    .description('Show how a filter expression is parsed')
    .argument('<query>', 'Filter expression')
    .action(async (query: string) => {
      try {
        const result = parseFilter(query, { maxDepth: await maxDepthFor(ctx) });
        if (!result.ok) {
          exitWithError('filter explain', new QueryError(query, result.error));
        }

        const explanation = {
          query,
          canonical: formatFilter(result.ast),
          fields: collectFields(result.ast),
          clauses: countClauses(result.ast),
          ast: result.ast,
        };

        if (getOutputOptions().json) {
          output(explanation);
          return;
        }

        console.log(`${bold('Canonical:')} ${explanation.canonical}`);
        console.log(`${bold('Fields:')}    ${explanation.fields.join(', ')}`);
        console.log(`${bold('Clauses:')}   ${explanation.clauses}`);
        console.log();
        for (const line of renderTree(result.ast)) {
          console.log(line);
        }
      } catch (error) {
        exitWithError('filter explain', error);
      }
    });

  cmd
    .command('fields')
    .description('List the fields a filter can use')
    .argument('[prefix]', 'Only fields starting with this prefix', '')
    .action((prefix: string) => {
      const fields = suggestFields(prefix);

      if (getOutputOptions().json) {
        output(
          fields.map((f) => ({
            name: f.name,
            kind: f.kind,
            aliases: f.aliases ?? [],
            operators: OPERATORS_BY_KIND[f.kind],
            description: f.description,
            examples: f.examples ?? [],
          }))
        );
        return;
      }

      if (fields.length === 0) {
        console.log(dim(`No fields start with "${prefix}".`));
        return;
      }

      outputTable(
        ['Field', 'Kind', 'Operators', 'Description'],
        fields.map((f) => [
          f.aliases?.length ? `${f.name} (${f.aliases.join(', ')})` : f.name,
          f.kind,
          OPERATORS_BY_KIND[f.kind].join(' '),
          f.description,
        ])
      );

      console.log();
      console.log('Examples:');
      for (const example of fields.flatMap((f) => f.examples ?? [])) {
        console.log(`  ${example}`);
      }
    });

  return cmd;
}
