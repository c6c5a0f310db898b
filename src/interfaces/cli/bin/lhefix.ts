#!/usr/bin/env node
import { fixCommand } from '../commands/index.js';
import { runCli } from '../shared.js';

runCli(fixCommand);
