#!/usr/bin/env node
/**
 * Arbor CLI entry point
 */

import { createProgram } from './program.js';

createProgram().parse();
