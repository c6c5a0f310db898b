#!/usr/bin/env node
import { showCommand } from '../commands/index.js';
import { runCli } from '../shared.js';

runCli(showCommand);
