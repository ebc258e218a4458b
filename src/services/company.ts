/**
 * Company Service
 * Company files the signed-in user can open
 */

import { FIELDS, pickList } from '../lib/fields.js';
import { fingerprint } from './cache.js';
import type { RequestExecutor, RequestScope } from './api.js';
import type { CompanyFile, JsonObject } from '../types/api.js';

export class CompanyService {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  /**
   * Called outside any company file, so no company file id is needed
   */
  async listCompanyFiles(scope: Pick<RequestScope, 'signal'> = {}): Promise<JsonObject[]> {
    const result = await this.executor.execute<CompanyFile[] | CompanyFile>('GET', '/', {
      signal: scope.signal,
      requireCompanyFile: false,
      cacheKey: fingerprint('GET', '/'),
    });
    const files = Array.isArray(result) ? result : [result];
    return pickList(files, FIELDS.companyFileList);
  }
}
