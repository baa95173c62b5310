/**
 * Circuit board fact rules
 *
 * Each rule lists alternative phrasings seen in board analysis pages. The
 * first pattern that matches wins; a rule without a match contributes nothing.
 */

import type { ReviewDatumRecord, SpecRecord } from '../types/index.js';

export const CIRCUIT_SPEC_CATEGORY = 'Circuit Board';

interface FactRule {
  dataType: string;
  key: string;
  unit: string;
  patterns: readonly RegExp[];
  /** Build the stored value from a match; null rejects the match */
  value?: (match: RegExpMatchArray) => string | null;
}

const WORD_NUMBERS: Readonly<Record<string, string>> = {
  one: '1',
  two: '2',
  three: '3',
  four: '4',
  five: '5',
  six: '6',
  seven: '7',
  eight: '8',
  nine: '9',
  ten: '10',
};

function group(match: RegExpMatchArray, index: number): string | null {
  const value = match[index];
  return value === undefined || value === '' ? null : value;
}

const FACT_RULES: readonly FactRule[] = [
  {
    dataType: 'GPU',
    key: 'VRM Phases',
    unit: 'phase',
    patterns: [
      /A\s+(\d+\+\d+)\s+phase\s+VRM\s+powers\s+the\s+GPU/i,
      /(\d+\+\d+)[\s-]*phase\s+VRM.*powers\s+the\s+GPU/i,
      /GPU\s+is\s+powered\s+by\s+a\s+(\d+\+\d+)[\s-]*phase/i,
      /GPU.*?(\d+\+\d+)[\s-]*phase\s+VRM/i,
      /The\s+GPU\s+uses\s+a\s+(\d+\+\d+)[\s-]*phase/i,
    ],
  },
  {
    dataType: 'GPU',
    key: 'Controller',
    unit: '',
    patterns: [
      /managed\s+by\s+a\s+Monolithic\s+Power\s+Systems\s+(MP\d+[A-Z]*)/i,
      /controller\s+is\s+(?:a\s+)?(?:Monolithic\s+Power\s+Systems\s+)?(MP\d+[A-Z]*)/i,
      /(MP\d+[A-Z]*)\s+controller/i,
      /controller\s+chip\s+is\s+(?:a\s+)?(?:Monolithic\s+Power\s+Systems\s+)?(MP\d+[A-Z]*)/i,
    ],
  },
  {
    dataType: 'GPU',
    key: 'MOSFET',
    unit: '',
    patterns: [
      /GPU\s+power\s+phases\s+use\s+(\w+\s+\w+\s+\w+\s+DrMOS)(?:\s+with\s+a\s+rating\s+of\s+(\d+)\s+A)?/i,
      /(\w+\s+\w+\s+\w+\s+DrMOS)(?:\s+rated\s+for\s+(\d+)\s+A)?/i,
      /DrMOS\s+devices\s+are\s+(\w+\s+\w+\s+\w+)/i,
    ],
    value: (match) => {
      const part = group(match, 1);
      const rating = group(match, 2);
      if (!part) {
        return null;
      }
      return rating ? `${part} ${rating}A` : part;
    },
  },
  {
    dataType: 'Memory',
    key: 'VRM Phases',
    unit: 'phase',
    patterns: [
      /memory\s+chips\s+is\s+a\s+(\d+\+\d+)\s+phase\s+VRM/i,
      /memory\s+is\s+provided\s+by\s+a\s+(\d+\+\d+)\s+phase/i,
      /memory\s+power\s+is\s+a\s+(\d+\+\d+)\s+phase/i,
      /memory\s+voltage\s+uses\s+a\s+(\d+\+\d+)\s+phase/i,
    ],
  },
  {
    dataType: 'Memory',
    key: 'Controller',
    unit: '',
    patterns: [
      /driven\s+by\s+a\s+(?:second\s+)?Monolithic\s+Power\s+Systems\s+(MP\d+[A-Z]*)/i,
      /memory\s+controller\s+is\s+(?:a\s+)?(?:Monolithic\s+Power\s+Systems\s+)?(MP\d+[A-Z]*)/i,
      /memory\s+voltage\s+is\s+controlled\s+by\s+(?:a\s+)?(MP\d+[A-Z]*)/i,
    ],
  },
  {
    dataType: 'Memory',
    key: 'Memory Chips',
    unit: 'Gbps',
    patterns: [
      /memory\s+chips\s+are\s+made\s+by\s+(\w+),\s+and\s+bear\s+the\s+model\s+number\s+([\w-]+),\s+they\s+are\s+rated\s+for\s+(\d+)\s+Gbps/i,
      /(\w+)\s+([\w-]+)\s+memory\s+chips.*?rated\s+(?:at|for)\s+(\d+)\s+Gbps/i,
      /memory\s+chips\s+(?:are|from)\s+(\w+)\s+([\w-]+).*?(\d+)\s+Gbps/i,
    ],
    value: (match) => {
      const maker = group(match, 1);
      const model = group(match, 2);
      const speed = group(match, 3);
      return maker && model && speed ? `${maker} ${model} ${speed}` : null;
    },
  },
  {
    dataType: 'Memory',
    key: 'MOSFET',
    unit: '',
    patterns: [
      /memory\s+is\s+handled\s+by\s+(\w+\s+\w+\s+\w+\s+DrMOS)/i,
      /memory\s+VRM\s+uses\s+(\w+\s+\w+\s+\w+\s+DrMOS)/i,
      /memory\s+power\s+circuitry\s+uses\s+(\w+\s+\w+\s+\w+\s+DrMOS)/i,
    ],
  },
  {
    dataType: 'Weight',
    key: 'Total',
    unit: 'g',
    patterns: [
      /weighs\s+(\d+(?:\.\d+)?)\s*g\b/i,
      /weight\s+of\s+(\d+(?:\.\d+)?)\s*g\b/i,
      /weight:?\s+(\d+(?:\.\d+)?)\s*g\b/i,
      /comes\s+in\s+at\s+(\d+(?:\.\d+)?)\s*g\b/i,
    ],
  },
  {
    dataType: 'Heatpipes',
    key: 'Count',
    unit: 'count',
    patterns: [
      /\b(\d+|one|two|three|four|five|six|seven|eight|nine|ten)\s+heatpipes/i,
      /heatpipes:?\s+(\d+|one|two|three|four|five|six|seven|eight|nine|ten)\b/i,
    ],
    value: (match) => {
      const raw = group(match, 1);
      if (!raw) {
        return null;
      }
      return WORD_NUMBERS[raw.toLowerCase()] ?? raw;
    },
  },
];

/**
 * Pull every recognized circuit board fact out of a review body
 */
export function extractCircuitFacts(body: string, productName: string): ReviewDatumRecord[] {
  const facts: ReviewDatumRecord[] = [];

  for (const rule of FACT_RULES) {
    for (const pattern of rule.patterns) {
      const match = body.match(pattern);
      if (!match) {
        continue;
      }
      const value = rule.value ? rule.value(match) : group(match, 1);
      if (value === null) {
        continue;
      }
      facts.push({
        dataType: rule.dataType,
        key: rule.key,
        value,
        unit: rule.unit,
        productName,
      });
      break;
    }
  }

  return facts;
}

/**
 * Board specs derived from circuit board facts
 */
export function factsToSpecs(facts: readonly ReviewDatumRecord[]): SpecRecord[] {
  return facts.map((fact) => ({
    category: CIRCUIT_SPEC_CATEGORY,
    name: `${fact.dataType} ${fact.key}`,
    value: fact.unit && fact.unit !== 'count' ? `${fact.value} ${fact.unit}` : fact.value,
  }));
}
