/**
 * Arbor CLI program
 *
 * Loads a JSON document into an arena, optionally applies one structural
 * edit, and prints the result as text, as a tree outline or as the raw
 * token stream.
 */

import { Command, Option } from 'commander';
import * as fs from 'fs';
import {
  Arena,
  defaultColorScheme,
  describeToken,
  displayTokens,
  toStyledText,
  toText,
  treeView,
  type ColorScheme,
} from 'arbor-core';
import { addValueToArena, type Json, type JsonFormat } from 'arbor-json';
import { loadColorScheme } from './config.js';
import { applyEdit, parseDelete, parseInsert, parsePath, resolvePath, type EditCommand } from './edit.js';

export type View = 'text' | 'tree' | 'tokens';

export interface CliOptions {
  format: JsonFormat;
  view: View;
  color: boolean;
  scheme?: string;
  debugHighlighting: boolean;
  at: string;
  insert?: string;
  delete?: string;
}

/**
 * Everything the program touches outside itself
 */
export interface CliIo {
  readFile(path: string): string;
  stdout(data: string): void;
  stderr(data: string): void;
  exit(code: number): void;
  env: Readonly<Record<string, string | undefined>>;
}

export const processIo: CliIo = {
  readFile: (path) => fs.readFileSync(path, 'utf-8'),
  stdout: (data) => {
    process.stdout.write(data);
  },
  stderr: (data) => {
    process.stderr.write(data);
  },
  exit: (code) => process.exit(code),
  env: process.env,
};

function editCommand(options: CliOptions): EditCommand | null {
  if (options.insert !== undefined && options.delete !== undefined) {
    throw new Error('Use either --insert or --delete, not both');
  }
  if (options.insert !== undefined) return parseInsert(options.insert);
  if (options.delete !== undefined) return parseDelete(options.delete);
  return null;
}

/**
 * Render the document the way --view asks for
 */
export function render(root: Json, arena: Arena<Json>, options: CliOptions, scheme: ColorScheme): string {
  switch (options.view) {
    case 'tree':
      return treeView(root, arena);
    case 'tokens':
      return displayTokens(root, arena, options.format)
        .map(({ node, token }) => `${node.displayName()}\t${describeToken(token)}`)
        .join('\n');
    case 'text':
      if (options.color || options.debugHighlighting) {
        return toStyledText(root, arena, options.format, {
          scheme,
          debugHighlighting: options.debugHighlighting,
        });
      }
      return toText(root, arena, options.format);
  }
}

/**
 * Build the command-line program
 */
export function createProgram(io: CliIo = processIo): Command {
  const program = new Command();

  program
    .name('arbor')
    .description('Render and edit JSON documents as structural trees')
    .version('0.1.0')
    .addOption(new Option('-f, --format <style>', 'Format style').choices(['pretty', 'compact']).default('pretty'))
    .addOption(new Option('-v, --view <view>', 'What to print').choices(['text', 'tree', 'tokens']).default('text'))
    .option('--color', 'Colour text by syntax category', false)
    .option('-s, --scheme <file>', 'Colour scheme JSON file')
    .option('--debug-highlighting', 'Colour text by node instead of by category', false)
    .option('-a, --at <path>', 'Slash-separated child indices of the node to edit', '')
    .option('-i, --insert <index:char>', 'Insert the node typed as <char> at <index>')
    .option('-d, --delete <index>', 'Delete the child at <index>')
    .argument('<input>', 'Input JSON file')
    .action((inputFile: string, options: CliOptions) => {
      try {
        const document: unknown = JSON.parse(io.readFile(inputFile));
        const arena = new Arena<Json>();
        const rootRef = addValueToArena(arena, document);

        const command = editCommand(options);
        if (command) {
          const target = arena.get(resolvePath(arena, rootRef, parsePath(options.at)));
          const result = applyEdit(arena, target, command);
          if (!result.ok) {
            // A rejected edit leaves the tree as it was; report it and print nothing
            io.stderr(`Error: ${result.error.message}\n`);
            io.exit(1);
            return;
          }
        }

        const scheme = options.scheme ? loadColorScheme(options.scheme, io.readFile) : defaultColorScheme();
        io.stdout(render(arena.get(rootRef), arena, options, scheme) + '\n');
      } catch (error) {
        io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        if (io.env.DEBUG && error instanceof Error && error.stack) {
          io.stderr(error.stack + '\n');
        }
        io.exit(1);
      }
    });

  return program;
}
