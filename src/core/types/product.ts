/**
 * Product-related types
 */

import { z } from "zod";

/** Extractor output for one product page; ephemeral */
export interface ProductCandidate {
  id: string; // stable, derived from the URL path only
  name: string;
  url: string;
  price: string | null; // e.g. "$19.99"
  category: string | null;
  imageUrls: string[]; // canonical, deduplicated, encounter order
}

export const ImageRecordSchema = z.object({
  filename: z.string().min(1),
  originalUrl: z.string(),
  localPath: z.string(),
  downloadedAt: z.string(),
});

export const ProductSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  url: z.string(),
  price: z.string().nullable().default(null),
  category: z.string().nullable().default(null),
  images: z.array(ImageRecordSchema).default([]),
  crawledAt: z.string(),
});

export const CrawlResultSchema = z.object({
  products: z.array(ProductSchema).default([]),
  crawledAt: z.string(),
  totalProducts: z.number().int().nonnegative().default(0),
  totalImages: z.number().int().nonnegative().default(0),
});

export type ImageRecord = z.infer<typeof ImageRecordSchema>;
export type Product = z.infer<typeof ProductSchema>;
export type CrawlResult = z.infer<typeof CrawlResultSchema>;

export type ImageOutcomeStatus = "downloaded" | "existing" | "failed";

/** What happened to one image URL during a product download batch */
export interface ImageOutcome {
  url: string;
  filename: string;
  localPath: string;
  status: ImageOutcomeStatus;
  record?: ImageRecord;
  error?: string;
}
