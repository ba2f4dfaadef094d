import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { isErrorResponse } from './response-classifier.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function loadFixture(filename: string): string {
  return fs.readFileSync(path.join(__dirname, '__fixtures__', 'auction-pages', filename), 'utf-8');
}

describe('isErrorResponse', () => {
  it('should flag pages mentioning an error without the products table', () => {
    expect(isErrorResponse(loadFixture('error-page.html'))).toBe(true);
  });

  it('should match "error" case-insensitively', () => {
    expect(isErrorResponse('<p>Se ha producido un error</p>')).toBe(true);
  });

  it('should accept pages that mention an error but still carry the products table', () => {
    const html = '<p>ERROR de redondeo corregido</p><table class="tab_pre_pro"></table>';

    expect(isErrorResponse(html)).toBe(false);
  });

  it('should accept pages without any error text', () => {
    expect(isErrorResponse(loadFixture('auction-with-products.html'))).toBe(false);
    expect(isErrorResponse(loadFixture('auction-without-table.html'))).toBe(false);
  });
});
