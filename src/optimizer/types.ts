/**
 * Product listing types.
 */

export interface Product {
  handle: string;
  title: string;
  /** HTML body. */
  description: string;
  vendor: string;
  productType: string;
  tags: string[];
  price: number;
  sku: string;
  images: string[];
}

export interface ListingAnalysis {
  /** 0-100. */
  score: number;
  issues: string[];
  titleLength: number;
  descriptionLength: number;
  tagCount: number;
  imageCount: number;
}

export interface OptimizationResult {
  handle: string;
  originalTitle: string;
  optimizedTitle: string;
  originalDescription: string;
  /** Markdown description. */
  optimizedDescription: string;
  metaDescription: string;
  suggestedTags: string[];
  scoreBefore: number;
  scoreAfter: number;
  issues: string[];
  improvementNotes: string[];
  createdAt: Date;
}
