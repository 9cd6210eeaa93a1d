/**
 * Vitest setup file
 * Keeps the shared logger quiet; diagnostics are asserted, not read from stderr
 */

import { logger } from '../src/utils/logger.js';

logger.setLevel('error');
