#!/usr/bin/env node
import { mergeCommand } from '../commands/index.js';
import { runCli } from '../shared.js';

runCli(mergeCommand);
