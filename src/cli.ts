#!/usr/bin/env node

/**
 * bench-recorder entry point
 */

import 'dotenv/config';
import { createProgram } from './cli/program.js';

createProgram().parse();
