#!/usr/bin/env node

import { createProgram } from './program';

// Parse arguments
createProgram().parse();
