// tests/unit/Normalizer.test.ts

import { describe, it, expect } from 'vitest';
import { Normalizer, PromoRecordSchema, formatCaptureDate } from '../../src/core/normalizer/Normalizer';
import { joinContent } from '../../src/core/normalizer/SourceMappers';
import type { BdoCampaignDetail, BdoRewardDetail, NormalizeContext } from '../../src/core/normalizer/types';
import { RecordValidationError } from '../../src/utils/errors';

const ctx: NormalizeContext = { runId: 'run-0001', capturedOn: '2025-06-15' };

function reward(overrides: Partial<BdoRewardDetail> = {}): BdoRewardDetail {
  return {
    kind: 'bdo-reward',
    id: '42',
    url: 'https://www.deals.bdo.com.ph/rewards/42',
    name: 'Travel Reward',
    description: '<p>Earn miles</p>',
    accordions: [],
    ...overrides,
  };
}

describe('Normalizer', () => {
  const normalizer = new Normalizer();

  describe('joinContent', () => {
    it('should treat missing and empty fragments the same', () => {
      expect(joinContent(['a', '', null, undefined, '   ', 'b'])).toBe('a\n\nb');
      expect(joinContent(['a', 'b'])).toBe('a\n\nb');
    });

    it('should trim fragments before joining', () => {
      expect(joinContent(['  first \n', '\tsecond'])).toBe('first\n\nsecond');
    });

    it('should return an empty string when nothing is left', () => {
      expect(joinContent([null, '', ' '])).toBe('');
    });
  });

  describe('BDO campaigns', () => {
    const campaign: BdoCampaignDetail = {
      kind: 'bdo-campaign',
      id: '7',
      url: 'https://www.deals.bdo.com.ph/treat-welcome/7',
      name: 'Dine Deal',
      headline: 'Save 20%',
      subHeadline: '',
      bodyText: '<p>Valid until <b>June 30</b></p>',
      enrolmentBodyText: '',
      additionalSections: ['<p>Terms apply</p>', ''],
    };

    it('should join landing copy, enrolment copy and sections in order', () => {
      expect(normalizer.normalize(campaign, ctx)).toEqual({
        run_id: 'run-0001',
        source_name: 'bdo',
        source_url: 'https://www.deals.bdo.com.ph/treat-welcome/7',
        content: 'Dine Deal\n\nSave 20%\n\nValid until June 30\n\nTerms apply',
        captured_on: '2025-06-15',
      });
    });

    it('should produce empty content when every field is blank', () => {
      const blank: BdoCampaignDetail = {
        ...campaign,
        name: '',
        headline: '',
        bodyText: '',
        additionalSections: [],
      };

      expect(normalizer.normalize(blank, ctx).content).toBe('');
    });
  });

  describe('BDO rewards', () => {
    it('should handle a reward without accordions', () => {
      expect(normalizer.normalize(reward(), ctx).content).toBe('Travel Reward\n\nEarn miles');
    });

    it('should append one fragment for a single accordion', () => {
      const record = normalizer.normalize(
        reward({
          accordions: [{ title: 'Mechanics', body: '<ul><li>Step one</li><li>Step two</li></ul>' }],
        }),
        ctx
      );

      expect(record.content).toBe('Travel Reward\n\nEarn miles\n\nMechanics\nStep one\nStep two');
    });

    it('should skip empty accordions and trim one-sided ones', () => {
      const record = normalizer.normalize(
        reward({
          name: 'R',
          description: '',
          accordions: [
            { title: 'A', body: 'x' },
            { title: '', body: '' },
            { title: '', body: '<p>Only body</p>' },
            { title: 'Only title', body: '' },
          ],
        }),
        ctx
      );

      expect(record.content).toBe('R\n\nA\nx\n\nOnly body\n\nOnly title');
    });
  });

  describe('pages', () => {
    it('should keep the extracted text and page URL', () => {
      const record = normalizer.normalize(
        {
          kind: 'page',
          source: 'eastwest',
          url: 'https://www.eastwestbanker.com/promos/shop',
          text: '  Line one\nLine two ',
        },
        ctx
      );

      expect(record).toEqual({
        run_id: 'run-0001',
        source_name: 'eastwest',
        source_url: 'https://www.eastwestbanker.com/promos/shop',
        content: 'Line one\nLine two',
        captured_on: '2025-06-15',
      });
    });
  });

  describe('validation', () => {
    it('should reject a record without an absolute http(s) URL', () => {
      const page = { kind: 'page' as const, source: 'bpi' as const, text: 'x' };

      expect(() => normalizer.normalize({ ...page, url: '/relative/path' }, ctx)).toThrow(RecordValidationError);
      expect(() => normalizer.normalize({ ...page, url: 'ftp://files.example.test/a' }, ctx)).toThrow(
        RecordValidationError
      );
    });

    it('should reject an empty run id', () => {
      expect(() => normalizer.normalize(reward(), { ...ctx, runId: '' })).toThrow(
        'Schema validation failed for bdo record'
      );
    });

    it('should accept every record it produces', () => {
      expect(PromoRecordSchema.safeParse(normalizer.normalize(reward(), ctx)).success).toBe(true);
    });
  });

  describe('formatCaptureDate', () => {
    it('should format the local calendar date', () => {
      expect(formatCaptureDate(new Date(2025, 0, 5, 23, 59))).toBe('2025-01-05');
      expect(formatCaptureDate(new Date(2024, 11, 31))).toBe('2024-12-31');
    });
  });
});
