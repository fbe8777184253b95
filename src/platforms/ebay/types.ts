/**
 * eBay API response types (Browse API + Marketplace Insights API)
 *
 * Only the fields this tool reads. Responses are narrowed from `unknown`
 * with the parse* helpers below.
 */

import { z } from 'zod';

export interface EbayAmount {
  value: string;
  currency: string;
}

// Browse API item_summary/search
export interface EbayItemSummary {
  itemId: string;
  title?: string;
  price?: EbayAmount;
  conditionId?: string;
}

export interface EbaySearchResponse {
  total: number;
  itemSummaries: EbayItemSummary[];
}

// Marketplace Insights item_sales/search
export interface EbaySoldItem {
  itemId: string;
  title?: string;
  lastSoldDate?: string;
  lastSoldPrice?: EbayAmount;
  totalSoldQuantity?: number;
  conditionId?: string;
}

export interface EbaySoldSearchResponse {
  total: number;
  itemSales: EbaySoldItem[];
}

/** Search criteria shared by both APIs, usually derived from a saved search URL. */
export interface SearchQuery {
  keyword: string;
  categoryId?: string | null;
  conditionId?: string | null;
  buyItNow?: boolean;
  /** Results per page; count-only calls use 1 */
  limit?: number;
}

// =============================================================================
// Response schemas
// =============================================================================

// A malformed field is dropped rather than failing the whole response
const optionalString = z.string().optional().catch(undefined);

const amountSchema = z.object({
  value: z.string(),
  currency: z.string().catch('USD'),
});

const totalSchema = z.number().finite().nonnegative().catch(0);

const itemSummarySchema = z.object({
  itemId: z.string().catch(''),
  title: optionalString,
  price: amountSchema.optional().catch(undefined),
  conditionId: optionalString,
});

const soldItemSchema = z.object({
  itemId: z.string().catch(''),
  title: optionalString,
  lastSoldDate: optionalString,
  lastSoldPrice: amountSchema.optional().catch(undefined),
  totalSoldQuantity: z.number().optional().catch(undefined),
  conditionId: optionalString,
});

const searchEnvelopeSchema = z.object({
  total: totalSchema,
  itemSummaries: z.array(z.unknown()).catch([]),
});

const soldEnvelopeSchema = z.object({
  total: totalSchema,
  itemSales: z.array(z.unknown()).catch([]),
});

/** Parse each entry on its own; entries that are not objects are skipped. */
function parseEach<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, items: readonly unknown[]): T[] {
  return items.flatMap((item) => {
    const result = schema.safeParse(item);
    return result.success ? [result.data] : [];
  });
}

export function parseSearchResponse(body: unknown): EbaySearchResponse {
  const envelope = searchEnvelopeSchema.safeParse(body);
  if (!envelope.success) return { total: 0, itemSummaries: [] };
  return {
    total: envelope.data.total,
    itemSummaries: parseEach(itemSummarySchema, envelope.data.itemSummaries),
  };
}

export function parseSoldSearchResponse(body: unknown): EbaySoldSearchResponse {
  const envelope = soldEnvelopeSchema.safeParse(body);
  if (!envelope.success) return { total: 0, itemSales: [] };
  return {
    total: envelope.data.total,
    itemSales: parseEach(soldItemSchema, envelope.data.itemSales),
  };
}
