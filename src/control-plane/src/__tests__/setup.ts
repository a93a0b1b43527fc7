/**
 * Jest test setup file
 */

import { resetConfig } from '../utils/config.js';
import { resetLogger } from '../utils/logger.js';
import { resetDocClient } from '../repositories/base.repository.js';
import { resetModelCatalog } from '../services/model-catalog.js';

process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'error';
process.env['LOG_PRETTY'] = 'false';

beforeEach(() => {
  resetConfig();
  resetLogger();
  resetDocClient();
  resetModelCatalog();
});

jest.setTimeout(10000);
