// src/connectors/bdo/types.ts

import { z } from 'zod';

export interface BdoConnectorOptions {
  identifier?: string;               // Deals site client identifier, sent with the token request
  pageSize: number;
  catalogId: number;
}

export interface CatalogItemRef {
  itemType: string;                  // 'Campaign', 'Reward::Campaign', ...
  itemId: string;
}

export interface BdoCatalog {
  headers: Record<string, string>;   // Bearer header set reused for every API call
  campaigns: CatalogItemRef[];
  rewards: CatalogItemRef[];
}

// Deals API payloads. Fields are optional and tolerant of nulls: the API omits
// copy that was never authored and the content is optional in every record.

const optionalText = z.string().nullish().catch(undefined);

const identifier = z.union([z.string().min(1), z.number()]).transform(String);

export const TokenResponseSchema = z.object({
  bearer_token: z.string().nullish(),
});

export const CategoriesResponseSchema = z.object({
  data: z.array(z.unknown()).nullish(),
});

export const CategorySchema = z.object({
  id: identifier,
});

export const ItemsPageSchema = z.object({
  meta: z
    .object({
      total_pages: z.unknown(),
    })
    .nullish(),
  data: z.array(z.unknown()).nullish(),
});

export const TotalPagesSchema = z.number().int().nonnegative();

export const CatalogItemSchema = z.object({
  item_type: z.string().min(1),
  item_id: identifier,
});

export const AdditionalSectionSchema = z.object({ body_text: optionalText });

export const CampaignResponseSchema = z.object({
  data: z.object({
    name: optionalText,
    display_properties: z
      .object({
        landing_page: z
          .object({
            headline: optionalText,
            sub_headline: optionalText,
            body_text: optionalText,
            additional_sections: z.array(z.unknown()).nullish().catch(undefined),
          })
          .nullish()
          .catch(undefined),
        enrolment_page: z
          .object({ body_text: optionalText })
          .nullish()
          .catch(undefined),
      })
      .nullish()
      .catch(undefined),
  }),
});

export const RewardResponseSchema = z.object({
  data: z.object({
    name: optionalText,
    description: optionalText,
    accordions: z.array(z.unknown()).nullish().catch(undefined),
  }),
});

export const AccordionSchema = z.object({
  title: optionalText,
  body: optionalText,
});
