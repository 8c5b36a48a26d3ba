#!/usr/bin/env node

import dotenv from 'dotenv';
import { runListener } from './listener';

dotenv.config();

try {
  runListener(process.env, { exit: (code) => process.exit(code) });
} catch (error) {
  console.error('Fatal error starting server:', error);
  process.exit(1);
}
