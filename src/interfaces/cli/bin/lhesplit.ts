#!/usr/bin/env node
import { splitCommand } from '../commands/index.js';
import { runCli } from '../shared.js';

runCli(splitCommand);
