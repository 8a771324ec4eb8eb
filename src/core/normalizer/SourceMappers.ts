// src/core/normalizer/SourceMappers.ts

import { htmlToText } from '../html/HtmlExtractor';
import type {
  BdoCampaignDetail,
  BdoRewardDetail,
  NormalizeContext,
  PageDetail,
  RawDetailRecord,
  UnifiedPromoRecord,
} from './types';

type Mapper<R extends RawDetailRecord> = (raw: R, ctx: NormalizeContext) => UnifiedPromoRecord;

type MapperTable = { [K in RawDetailRecord['kind']]: Mapper<Extract<RawDetailRecord, { kind: K }>> };

/**
 * Blank-line join of the trimmed fragments, dropping empty ones.
 * Missing and empty fragments contribute the same thing: nothing.
 */
export function joinContent(fragments: Array<string | null | undefined>): string {
  return fragments
    .map((fragment) => (fragment ?? '').trim())
    .filter((fragment) => fragment.length > 0)
    .join('\n\n');
}

export class SourceMappers {
  private mappers: MapperTable = {
    'bdo-campaign': this.mapBdoCampaign,
    'bdo-reward': this.mapBdoReward,
    page: this.mapPage,
  };

  get<K extends RawDetailRecord['kind']>(kind: K): MapperTable[K] {
    return this.mappers[kind];
  }

  // BDO campaign: landing page copy, enrolment copy, then each additional section
  private mapBdoCampaign(raw: BdoCampaignDetail, ctx: NormalizeContext): UnifiedPromoRecord {
    return {
      run_id: ctx.runId,
      source_name: 'bdo',
      source_url: raw.url,
      content: joinContent([
        raw.name,
        raw.headline,
        raw.subHeadline,
        htmlToText(raw.bodyText),
        htmlToText(raw.enrolmentBodyText),
        ...raw.additionalSections.map((section) => htmlToText(section)),
      ]),
      captured_on: ctx.capturedOn,
    };
  }

  // BDO reward: name, description, then one "title\nbody" fragment per accordion
  private mapBdoReward(raw: BdoRewardDetail, ctx: NormalizeContext): UnifiedPromoRecord {
    const accordionFragments = raw.accordions.map(({ title, body }) => {
      const bodyText = htmlToText(body);
      return title || bodyText ? `${title}\n${bodyText}` : '';
    });

    return {
      run_id: ctx.runId,
      source_name: 'bdo',
      source_url: raw.url,
      content: joinContent([raw.name, htmlToText(raw.description), ...accordionFragments]),
      captured_on: ctx.capturedOn,
    };
  }

  // HTML page sources: text was extracted at fetch time
  private mapPage(raw: PageDetail, ctx: NormalizeContext): UnifiedPromoRecord {
    return {
      run_id: ctx.runId,
      source_name: raw.source,
      source_url: raw.url,
      content: joinContent([raw.text]),
      captured_on: ctx.capturedOn,
    };
  }
}
