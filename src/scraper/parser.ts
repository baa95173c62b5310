/**
 * Catalog Page Parser
 *
 * Turns catalog, product, board and review pages into plain records.
 * Parsers never throw on odd markup: missing pieces yield empty results or
 * null, and the caller decides whether that is an extraction failure.
 */

import * as cheerio from 'cheerio';
import { REVIEW_OPTION_KEYWORDS } from '../config/index.js';
import { VENDOR_KEYWORDS } from '../config/review-types.js';
import { componentLogger } from '../utils/logger.js';
import { extractCircuitFacts, factsToSpecs } from './review-rules.js';
import type { ReviewDatumRecord, SpecRecord } from '../types/index.js';
import type {
  BoardListing,
  ProductDetail,
  ProductListing,
  ReviewContent,
  ReviewImage,
  ReviewOption,
  ReviewSection,
} from './types.js';

const logger = componentLogger('parser');

const TEXT_NODE = 3;

// ═══════════════════════════════════════════════════════════════════════════════
// Products
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Vendor of a product: the first word of its name, or a keyword lookup when
 * the name is a single word
 */
export function extractVendor(productName: string): string {
  const trimmed = productName.trim();
  if (trimmed.includes(' ')) {
    return trimmed.split(' ')[0] ?? 'Unknown';
  }

  const upper = trimmed.toUpperCase();
  for (const [vendor, keywords] of Object.entries(VENDOR_KEYWORDS)) {
    if (keywords.some((keyword) => upper.includes(keyword.toUpperCase()))) {
      return vendor;
    }
  }

  return 'Unknown';
}

/**
 * Name without its leading vendor word, or null for single-word names
 */
export function stripVendor(productName: string): string | null {
  const index = productName.indexOf(' ');
  return index === -1 ? null : productName.slice(index + 1);
}

/**
 * Rows of the catalog listing table
 */
export function parseProductList(html: string): ProductListing[] {
  const $ = cheerio.load(html);
  const table = $('table.processors').first();
  if (table.length === 0) {
    logger.warn('Catalog table not found');
    return [];
  }

  const headers = table.find('thead.colheader th');
  let nameIndex = -1;
  headers.each((index, th) => {
    if (nameIndex === -1 && $(th).text().trim() === 'Product Name') {
      nameIndex = index;
    }
  });

  if (nameIndex === -1) {
    logger.warn('Product Name column not found');
    return [];
  }

  const products: ProductListing[] = [];
  table.find('tr').each((_, row) => {
    const cell = $(row).find('td').eq(nameIndex);
    const link = cell.find('a').first();
    const name = link.text().trim();
    const url = link.attr('href')?.trim();
    if (name && url) {
      products.push({ name, url });
    }
  });

  logger.debug({ count: products.length }, 'Parsed catalog listing');
  return products;
}

/**
 * Product or board detail page: attributes plus every spec of every section
 */
export function parseProductDetail(html: string, baseUrl: string): ProductDetail | null {
  const $ = cheerio.load(html);
  const name = $('h1').first().text().trim();
  if (!name) {
    return null;
  }

  const imageUrl = findImageUrl($);
  const description = $('.desc.p').first().text().trim();
  const specs: SpecRecord[] = [];

  $('.sectioncontainer section').each((_, element) => {
    const section = $(element);
    if (section.find('.gpudb-relative-performance').length > 0) {
      return;
    }

    const category = section.find('h2').first().text().trim();
    if (!category) {
      return;
    }

    section.find('dl').each((_, dl) => {
      const terms = $(dl).find('dt');
      $(dl)
        .find('dd')
        .each((i, dd) => {
          if (i >= terms.length) {
            return;
          }
          // text and link text directly inside the <dd>, nested markup ignored
          let specValue = '';
          $(dd)
            .contents()
            .each((_, node) => {
              const wrapped = $(node);
              if (node.nodeType === TEXT_NODE || wrapped.is('a')) {
                specValue += wrapped.text().trim();
              }
            });
          const specName = terms.eq(i).text().trim();
          if (specName && specValue.trim()) {
            specs.push({ category, name: specName, value: specValue.trim() });
          }
        });
    });

    section.find('table tbody tr').each((_, row) => {
      const cells = $(row).find('td, th');
      if (cells.length < 2) {
        return;
      }
      const specName = cells.eq(0).text().trim();
      const specValue = cells.eq(1).text().trim();
      if (specName && specValue) {
        specs.push({ category, name: specName, value: specValue });
      }
    });
  });

  return {
    attributes: {
      name,
      vendor: extractVendor(name),
      description: description || null,
      imageUrl: imageUrl ? new URL(imageUrl, baseUrl).toString() : null,
    },
    specs,
  };
}

function findImageUrl($: cheerio.CheerioAPI): string | null {
  const wrapped = $('.gpudb-large-image__wrapper img').first().attr('src');
  if (wrapped) {
    return wrapped;
  }

  const showcase = $('.product-showcase img, .card-body img, .product-image img').first().attr('src');
  if (showcase) {
    return showcase;
  }

  const sources = $('img')
    .map((_, img) => $(img).attr('src') ?? '')
    .get()
    .filter((src) => src.length > 0);

  const large = sources.find((src) => /large|full|big/.test(src));
  if (large) {
    return large;
  }

  return sources.find((src) => !src.endsWith('.gif') && !src.endsWith('.ico')) ?? null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Boards
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Rows of the boards table on a product page
 */
export function parseBoardsSection(html: string): BoardListing[] {
  const $ = cheerio.load(html);
  const section = $('#boards').first();
  if (section.length === 0) {
    return [];
  }

  const sectionTitle = section.find('h2').first().text().trim() || 'Boards';
  const table = section.find('table').first();
  const headers = table
    .find('thead th.sort-key')
    .map((_, th) => $(th).text().trim())
    .get();

  const boards: BoardListing[] = [];
  table.find('tbody tr').each((_, element) => {
    const row = $(element);
    const link = row.find('.board-table-title__inner a').first();
    const name = link.text().trim();
    if (!name) {
      return;
    }

    const cells = row.find('td');
    const columns: Record<string, string> = {};
    headers.forEach((header, index) => {
      if (index < cells.length) {
        columns[header] = cells.eq(index).text().trim();
      }
    });

    const board: BoardListing = { sectionTitle, name, columns };
    const url = link.attr('href')?.trim();
    if (url) {
      board.url = url;
    }
    const reviewUrl = row.find('a.board-review-by-tpu').first().attr('href')?.trim();
    if (reviewUrl) {
      board.reviewUrl = reviewUrl;
    }
    boards.push(board);
  });

  return boards;
}

/**
 * Specs for a board that has no page of its own, taken from its table row
 */
export function boardRowSpecs(board: BoardListing): SpecRecord[] {
  return Object.entries(board.columns)
    .filter(([name, value]) => name.length > 0 && value.length > 0)
    .map(([name, value]) => ({ category: board.sectionTitle, name, value }));
}

/**
 * One-line description built from a spec list
 */
export function describeSpecs(specs: readonly SpecRecord[]): string {
  return specs.map((spec) => `${spec.name}: ${spec.value}`).join(' | ');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Reviews
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recognized entries of a review's page drop-down
 */
export function parseReviewOptions(html: string): ReviewOption[] {
  const $ = cheerio.load(html);
  const options: ReviewOption[] = [];

  $('#pagesel option').each((_, element) => {
    const option = $(element);
    const originalText = option.text().trim();
    // cheerio falls back to the option text when the attribute is missing
    const value = option.is('[value]') ? option.attr('value')?.trim() : undefined;
    const text = originalText.replace(/^\d+-\s*/, '');

    if (!value) {
      return;
    }
    const lower = text.toLowerCase();
    if (REVIEW_OPTION_KEYWORDS.some((keyword) => lower.includes(keyword.toLowerCase()))) {
      options.push({ text, originalText, value });
    }
  });

  return options;
}

/**
 * Body, sections, images and structured data of one review page, or null
 * when the page has no titled text block
 */
export function parseReviewContent(html: string, reviewType: string): ReviewContent | null {
  const $ = cheerio.load(html);
  const sections: ReviewSection[] = [];

  $('div.text.p').each((_, div) => {
    const open: Array<{ title: string; lines: string[] }> = [];

    $(div)
      .contents()
      .each((_, node) => {
        const wrapped = $(node);
        if (wrapped.is('h2')) {
          open.push({ title: wrapped.text().trim(), lines: [] });
          return;
        }
        const current = open[open.length - 1];
        if (!current) {
          return;
        }
        if (node.nodeType === TEXT_NODE || wrapped.is('p, span, div')) {
          const text = wrapped.text().trim();
          if (text) {
            current.lines.push(text);
          }
        }
      });

    for (const section of open) {
      sections.push({ title: section.title, content: section.lines.join('\n') });
    }
  });

  const first = sections[0];
  if (!first) {
    return null;
  }

  const title = first.title;
  const body = sections.map((section) => section.content).join('\n\n');
  const images = collectImages($);
  const data: ReviewDatumRecord[] = images.map((image) => ({
    dataType: 'Image',
    key: image.section,
    value: image.url,
    unit: 'URL',
    productName: title,
  }));
  let specs: SpecRecord[] = [];

  const type = reviewType.toLowerCase();
  if (type.includes('temperature') || type.includes('fan noise')) {
    data.push(...parseResultTables($, 'Thermal', /(\d+(?:\.\d+)?)\s*(°C|dBA|RPM|W)/));
  } else if (type.includes('overclocking') || type.includes('power limits')) {
    data.push(...parseResultTables($, 'Overclock', /(\d+(?:\.\d+)?(?:\/\d+(?:\.\d+)?)?)\s*([A-Za-z]+)?/));
  } else if (type.includes('circuit') || type.includes('pcb') || type.includes('board analysis')) {
    const facts = extractCircuitFacts(body, title);
    if (facts.length === 0) {
      logger.warn({ title }, 'No circuit board facts recognized');
    }
    data.push(...facts);
    specs = factsToSpecs(facts);
  }

  return { title, body, sections, images, data, specs };
}

/**
 * Images with the nearest preceding <h2> as their section
 */
function collectImages($: cheerio.CheerioAPI): ReviewImage[] {
  const images: ReviewImage[] = [];
  let section = 'General';

  $('h2, div.responsive-image-xx').each((_, element) => {
    const node = $(element);
    if (node.is('h2')) {
      section = node.text().trim() || section;
      return;
    }
    const img = node.find('img').first();
    const url = img.attr('src')?.trim();
    if (!url) {
      return;
    }
    const lower = url.toLowerCase();
    images.push({
      section,
      url,
      alt: img.attr('alt') ?? '',
      kind: lower.includes('chart') || lower.includes('graph') ? 'chart' : 'image',
    });
  });

  return images;
}

/**
 * Highlighted rows of result tables: first cell is the product, every other
 * cell a measured value keyed by its column header
 */
function parseResultTables(
  $: cheerio.CheerioAPI,
  dataType: string,
  valuePattern: RegExp
): ReviewDatumRecord[] {
  const records: ReviewDatumRecord[] = [];

  $('table').each((_, element) => {
    const table = $(element);
    const headers = table
      .find('thead th')
      .map((_, th) => $(th).text().trim())
      .get();

    table.find('tr.active').each((_, row) => {
      const cells = $(row).find('td, th');
      if (cells.length < 2) {
        return;
      }
      const productName = cells.eq(0).text().trim();

      for (let i = 1; i < cells.length; i++) {
        const match = cells.eq(i).text().trim().match(valuePattern);
        const value = match?.[1];
        if (!match || !value) {
          continue;
        }
        records.push({
          dataType,
          key: headers[i] || `col_${i}`,
          value,
          unit: match[2] ?? '',
          productName,
        });
      }
    });
  });

  return records;
}

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

/**
 * Publish date of a review page as YYYY-MM-DD, or null when absent
 */
export function parseReviewPostedDate(html: string): string | null {
  const $ = cheerio.load(html);

  const candidates = [
    $('time[datetime]').first().attr('datetime'),
    $('meta[property="article:published_time"]').first().attr('content'),
  ];
  for (const candidate of candidates) {
    const iso = candidate?.trim().match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (iso) {
      return `${iso[1]}-${iso[2]}-${iso[3]}`;
    }
  }

  const text = $('.date, .posted, time').first().text();
  const written = text.match(/([A-Za-z]+)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})/);
  if (written) {
    const [, monthName = '', day = '', year = ''] = written;
    const month = MONTHS.findIndex((name) => name.startsWith(monthName.toLowerCase()));
    if (month !== -1 && monthName.length >= 3) {
      return `${year}-${String(month + 1).padStart(2, '0')}-${day.padStart(2, '0')}`;
    }
  }

  return null;
}
