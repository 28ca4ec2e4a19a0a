#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { classifyCommand } from './commands/classify.js';
import { toolCommand, toolsCommand } from './commands/tool.js';

const program = new Command('lectern')
  .description('Analyse academic documents with a hosted LLM')
  .version('0.1.0');

program.addCommand(analyzeCommand());
program.addCommand(toolCommand());
program.addCommand(toolsCommand());
program.addCommand(classifyCommand());

program.parseAsync(process.argv).catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
