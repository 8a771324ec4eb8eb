// src/core/normalizer/types.ts

export const SOURCE_NAMES = ['bdo', 'bpi', 'eastwest', 'chinabank'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export interface UnifiedPromoRecord {
  run_id: string; // Shared by every record of one scrape invocation
  source_name: SourceName;
  source_url: string; // Absolute URL, synthesized when the origin has none
  content: string; // Blank-line join of the non-empty text fragments
  captured_on: string; // YYYY-MM-DD
}

export interface Accordion {
  title: string;
  body: string; // May contain markup
}

export interface BdoCampaignDetail {
  kind: 'bdo-campaign';
  id: string;
  url: string;
  name: string;
  headline: string;
  subHeadline: string;
  bodyText: string;
  enrolmentBodyText: string;
  additionalSections: string[]; // body_text of each section, may contain markup
}

export interface BdoRewardDetail {
  kind: 'bdo-reward';
  id: string;
  url: string;
  name: string;
  description: string;
  accordions: Accordion[];
}

/**
 * Text already extracted from one HTML page
 */
export interface PageDetail {
  kind: 'page';
  source: SourceName;
  url: string;
  text: string;
}

export type RawDetailRecord = BdoCampaignDetail | BdoRewardDetail | PageDetail;

export interface NormalizeContext {
  runId: string;
  capturedOn: string;
}
