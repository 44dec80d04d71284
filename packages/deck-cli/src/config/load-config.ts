/**
 * Builds the AssemblyConfig of a run from a config file or CLI arguments.
 * Relative paths in a config file resolve against the file's own directory.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ZodIssue } from 'zod';
import { createDeckError, describeCause, type AssemblyConfig } from '@deckwright/core';
import { DEFAULT_OUTPUT_FILE, DEFAULT_TITLE, DeckConfigFileSchema, type DeckConfigFile } from './schema.js';

export async function loadConfigFile(configPath: string, cwd: string = process.cwd()): Promise<AssemblyConfig> {
  const absolute = path.resolve(cwd, configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absolute, 'utf8');
  } catch (error) {
    throw createDeckError('DECK_CONFIG_PARSE_ERROR', `Cannot read config file ${absolute}: ${describeCause(error)}`, {
      path: absolute,
    });
  }

  let data: unknown;
  try {
    data = parseYaml(raw);
  } catch (error) {
    throw createDeckError('DECK_CONFIG_PARSE_ERROR', `Invalid YAML in ${absolute}: ${describeCause(error)}`, {
      path: absolute,
    });
  }

  const result = DeckConfigFileSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(formatIssue);
    throw createDeckError('DECK_CONFIG_PARSE_ERROR', `Invalid config ${absolute}:\n  ${issues.join('\n  ')}`, {
      path: absolute,
      issues,
    });
  }

  return toAssemblyConfig(result.data, path.dirname(absolute));
}

/**
 * A non-empty include_files list selects explicit mode; otherwise slide_dir
 * is scanned.
 */
export function toAssemblyConfig(file: DeckConfigFile, baseDir: string): AssemblyConfig {
  const slideSourceDir = file.slide_dir ? path.resolve(baseDir, file.slide_dir) : baseDir;
  const includes = file.include_files ?? [];

  return {
    title: file.title ?? DEFAULT_TITLE,
    slideSourceDir,
    outputPath: path.resolve(baseDir, file.output_file),
    templatePath: path.resolve(baseDir, file.template_file),
    slideList:
      includes.length > 0
        ? { kind: 'explicit', names: includes, baseDirectory: slideSourceDir }
        : { kind: 'discover', directory: slideSourceDir },
  };
}

export interface DirectoryArgs {
  slideDir: string;
  templateFile: string;
  outputDir: string;
  outputFile?: string;
  title?: string;
}

/**
 * Directory mode always discovers slides
 */
export function buildDirectoryConfig(args: DirectoryArgs, cwd: string = process.cwd()): AssemblyConfig {
  const slideSourceDir = path.resolve(cwd, args.slideDir);

  return {
    title: args.title ?? DEFAULT_TITLE,
    slideSourceDir,
    outputPath: path.resolve(cwd, args.outputDir, args.outputFile ?? DEFAULT_OUTPUT_FILE),
    templatePath: path.resolve(cwd, args.templateFile),
    slideList: { kind: 'discover', directory: slideSourceDir },
  };
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}
