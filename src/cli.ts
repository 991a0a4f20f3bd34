#!/usr/bin/env node
import { createCLI } from './cli-lib';

createCLI().parse();
