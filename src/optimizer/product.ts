/**
 * Reading and scoring product listings from a commerce-platform export
 * (Shopify column layout).
 */

import type { BrandConfig } from '../config/types.js';
import type { CsvRow } from '../shared/csv.js';
import type { ListingAnalysis, Product } from './types.js';

/**
 * Build a product from one export row. Variant rows repeat the handle with
 * blank product fields; callers dedupe by handle first.
 */
export function productFromRow(row: CsvRow): Product {
  const tags = (row['Tags'] ?? '')
    .split(',')
    .map((tag) => tag.trim())
    .filter(Boolean);
  const image = (row['Image Src'] ?? '').trim();
  const price = Number.parseFloat(row['Variant Price'] ?? '');

  return {
    handle: (row['Handle'] ?? '').trim(),
    title: (row['Title'] ?? '').trim(),
    description: row['Body (HTML)'] ?? '',
    vendor: row['Vendor'] ?? '',
    productType: row['Type'] ?? '',
    tags,
    price: Number.isFinite(price) ? price : 0,
    sku: row['Variant SKU'] ?? '',
    images: image ? [image] : [],
  };
}

/**
 * Score a listing out of 100, deducting for each problem found:
 *
 * | check                                   | deduction |
 * |-----------------------------------------|-----------|
 * | title under 30 chars / over 80 chars    | 15 / 10   |
 * | no brand category named in the title    | 20        |
 * | description under 300 chars             | 15        |
 * | description without `<p>` or `<div>`    | 5         |
 * | fewer than 5 tags                       | 10        |
 * | price not positive                      | 20        |
 * | fewer than 3 images                     | 10        |
 */
export function analyzeProduct(product: Product, brand: BrandConfig): ListingAnalysis {
  const issues: string[] = [];
  let score = 100;

  const titleLength = product.title.length;
  if (titleLength < 30) {
    issues.push('Title too short - aim for 60-70 characters');
    score -= 15;
  } else if (titleLength > 80) {
    issues.push('Title too long - will be truncated in search results');
    score -= 10;
  }

  const title = product.title.toLowerCase();
  if (!brand.mainCategories.some((category) => title.includes(category.toLowerCase()))) {
    issues.push('Title missing primary keyword');
    score -= 20;
  }

  const descriptionLength = product.description.length;
  if (descriptionLength < 300) {
    issues.push('Description too short - should be at least 300 characters');
    score -= 15;
  }

  if (!product.description.includes('<p>') && !product.description.includes('<div>')) {
    issues.push('Description lacks HTML formatting');
    score -= 5;
  }

  if (product.tags.length < 5) {
    issues.push('Too few product tags - add more for better discovery');
    score -= 10;
  }

  if (product.price <= 0) {
    issues.push('Invalid price');
    score -= 20;
  }

  if (product.images.length < 3) {
    issues.push('Need at least 3 product images');
    score -= 10;
  }

  return {
    score: Math.max(score, 0),
    issues,
    titleLength,
    descriptionLength,
    tagCount: product.tags.length,
    imageCount: product.images.length,
  };
}
