#!/usr/bin/env node
import { convertCommand } from '../commands/index.js';
import { runCli } from '../shared.js';

runCli(convertCommand);
