#!/usr/bin/env node
import { infoCommand } from '../commands/index.js';
import { runCli } from '../shared.js';

runCli(infoCommand);
