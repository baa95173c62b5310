/**
 * Review page vocabulary
 *
 * Sub-page options the crawler follows on a review page, and the rules used to
 * pair a stored review type with one of those options.
 */

/**
 * Drop-down options worth following on a review page
 */
export const REVIEW_OPTION_KEYWORDS = [
  'Pictures & Teardown',
  'Temperatures & Fan noise',
  'Cooler Performance Comparison',
  'Overclocking & Power Limits',
  'PCB Analysis',
  'Circuit Board',
  'PCB & Power',
  'Teardown & PCB',
  'Board Analysis',
] as const;

/**
 * Review type keyword -> accepted page-option keywords.
 * The first rule whose keywords appear in the stored type decides the match.
 */
export const REVIEW_TYPE_RULES: ReadonlyArray<{ name: string; keywords: readonly string[] }> = [
  { name: 'pictures', keywords: ['pictures', 'teardown', 'cooler'] },
  { name: 'temperatures', keywords: ['temperatures', 'fan noise', 'noise'] },
  { name: 'overclocking', keywords: ['overclocking', 'power limits'] },
  { name: 'circuit board', keywords: ['circuit', 'pcb', 'board analysis'] },
];

/**
 * Fallback vendor detection for names without a leading vendor word
 */
export const VENDOR_KEYWORDS: Readonly<Record<string, readonly string[]>> = {
  NVIDIA: ['NVIDIA', 'GeForce', 'RTX', 'GTX', 'Quadro', 'Tesla'],
  AMD: ['AMD', 'Radeon', 'RX', 'Vega', 'Fury', 'FirePro'],
  Intel: ['Intel', 'Arc', 'Iris', 'UHD Graphics', 'HD Graphics'],
  Matrox: ['Matrox'],
  S3: ['S3'],
  '3dfx': ['3dfx', 'Voodoo'],
  ATI: ['ATI'],
  SiS: ['SiS'],
  XGI: ['XGI'],
};
