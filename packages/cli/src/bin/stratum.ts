#!/usr/bin/env node
/**
 * bin/stratum.ts — entry point for the `stratum` command.
 */

import { buildProgram } from '../commands/index.js';

buildProgram().parse();
