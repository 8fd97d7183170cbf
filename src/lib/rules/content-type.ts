import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import isEmail from 'validator/lib/isEmail';
import isURL from 'validator/lib/isURL';
import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';
import * as logger from 'firebase-functions/logger';
import { defineRule, type Rule } from '../rule-registry';
import type { Issue } from '../types';
import { readString } from '../utils';

dayjs.extend(customParseFormat);

// ISO, day-first with / or -, month/year, bare year
const DATE_FORMATS = ['YYYY-MM-DD', 'DD/MM/YYYY', 'DD-MM-YYYY', 'MM/YYYY', 'YYYY'];

export type ContentType = 'integer' | 'decimal' | 'date' | 'email' | 'url' | 'phone';
type Check = (v: string) => boolean;

export function isDateLike(v: string): boolean {
  if (/^\d{4}$/.test(v)) {
    const y = Number(v);
    return y >= 1000 && y <= 2099;
  }
  return DATE_FORMATS.some((fmt) => dayjs(v, fmt, true).isValid());
}

export function contentChecks(defaultCountry: CountryCode): Record<ContentType, Check> {
  return {
    integer: (v) => /^[+-]?\d+$/.test(v),
    decimal: (v) => /^[+-]?(\d+([.,]\d*)?|[.,]\d+)([eE][+-]?\d+)?$/.test(v),
    date: isDateLike,
    email: (v) => isEmail(v),
    url: (v) => isURL(v, { protocols: ['http', 'https'], require_protocol: false }),
    phone: (v) => parsePhoneNumberFromString(v, defaultCountry)?.isValid() === true,
  };
}

function isContentType(v: string, checks: Record<ContentType, Check>): v is ContentType {
  return Object.prototype.hasOwnProperty.call(checks, v);
}

/** Per-cell check against the declared `content_type` of a column. */
export function contentTypeRule(defaultCountry: CountryCode = 'FR'): Rule {
  const checks = contentChecks(defaultCountry);
  return defineRule({
    id: 'generic.content_type',
    name: 'Content type',
    defaultSeverity: 'ERROR',
    scope: 'column',
    run(dataset, column, ctx) {
      const declared = readString(ctx.settings, 'content_type');
      if (!declared) return [];
      if (!isContentType(declared, checks)) {
        logger.warn('Unknown content_type, rule skipped', { column, contentType: declared });
        return [];
      }
      const check = checks[declared];
      const issues: Issue[] = [];
      dataset.column(column).forEach((v, row) => {
        if (v === null || v.trim() === '') return;
        if (!check(v.trim())) {
          issues.push(ctx.flag({ row, column, original: v, message: `Expected ${declared}, got "${v.trim()}"`, extra: { contentType: declared } }));
        }
      });
      return issues;
    },
  });
}
