import { logger } from '../src/middleware/logger.js';

logger.level = 'silent';
