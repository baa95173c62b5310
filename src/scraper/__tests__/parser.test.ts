import { describe, expect, it } from 'vitest';
import {
  boardRowSpecs,
  describeSpecs,
  extractVendor,
  parseBoardsSection,
  parseProductDetail,
  parseProductList,
  parseReviewContent,
  parseReviewOptions,
  parseReviewPostedDate,
  stripVendor,
} from '../parser.js';
import { BASE_URL, catalogPage, circuitReviewPage, productPage, thermalReviewPage } from '../../__tests__/fixtures.js';

describe('product pages', () => {
  it('reads names and links from the catalog listing', () => {
    const html = catalogPage([
      { name: 'Acme X1', url: '/gpu-specs/acme-x1.c1' },
      { name: 'Acme X2', url: '/gpu-specs/acme-x2.c2' },
    ]);

    expect(parseProductList(html)).toEqual([
      { name: 'Acme X1', url: '/gpu-specs/acme-x1.c1' },
      { name: 'Acme X2', url: '/gpu-specs/acme-x2.c2' },
    ]);
    expect(parseProductList('<html><body><p>maintenance</p></body></html>')).toEqual([]);
  });

  it('reads attributes and specs from a detail page', () => {
    const html = `<html><body>
<h1>Acme X1</h1>
<div class="gpudb-large-image__wrapper"><img src="/images/x1-large.jpg"></div>
<div class="desc p">A card for tests.</div>
<div class="sectioncontainer">
  <section><h2>Relative Performance</h2><div class="gpudb-relative-performance">chart</div></section>
  <section><h2>Memory</h2>
    <dl><dt>Memory Size</dt><dd>8 GB</dd></dl>
    <dl><dt>Bus Width</dt><dd>128 bit <span class="note">narrow</span></dd></dl>
  </section>
  <section><h2>Clock Speeds</h2>
    <table><tbody><tr><td>Base Clock</td><td>1500 MHz</td></tr></tbody></table>
  </section>
</div>
</body></html>`;

    expect(parseProductDetail(html, BASE_URL)).toEqual({
      attributes: {
        name: 'Acme X1',
        vendor: 'Acme',
        description: 'A card for tests.',
        imageUrl: 'https://catalog.test/images/x1-large.jpg',
      },
      specs: [
        { category: 'Memory', name: 'Memory Size', value: '8 GB' },
        { category: 'Memory', name: 'Bus Width', value: '128 bit' },
        { category: 'Clock Speeds', name: 'Base Clock', value: '1500 MHz' },
      ],
    });
  });

  it('returns null for a page without a product name', () => {
    expect(parseProductDetail('<html><body><p>gone</p></body></html>', BASE_URL)).toBeNull();
  });

  it('derives vendors from names', () => {
    expect(extractVendor('Vendor X1 OC')).toBe('Vendor');
    expect(extractVendor('GeForce256')).toBe('NVIDIA');
    expect(extractVendor('Widget')).toBe('Unknown');
    expect(stripVendor('Vendor X1 OC')).toBe('X1 OC');
    expect(stripVendor('Widget')).toBeNull();
  });
});

describe('boards', () => {
  const html = productPage({
    name: 'Acme X1',
    specs: [],
    boards: [
      { name: 'Vendor X1 OC', url: '/gpu-specs/vendor-x1-oc.b1', reviewUrl: '/review/vendor-x1-oc/', clock: '1600 MHz' },
      { name: 'Vendor X1 Mini', clock: '1500 MHz' },
    ],
  });

  it('reads every board row with its links', () => {
    expect(parseBoardsSection(html)).toEqual([
      {
        sectionTitle: 'Acme X1 Boards',
        name: 'Vendor X1 OC',
        url: '/gpu-specs/vendor-x1-oc.b1',
        reviewUrl: '/review/vendor-x1-oc/',
        columns: { Name: 'Vendor X1 OC', 'GPU Clock': '1600 MHz', Review: 'Review' },
      },
      {
        sectionTitle: 'Acme X1 Boards',
        name: 'Vendor X1 Mini',
        columns: { Name: 'Vendor X1 Mini', 'GPU Clock': '1500 MHz', Review: '' },
      },
    ]);
  });

  it('turns a board row into specs and a description', () => {
    const mini = parseBoardsSection(html)[1];
    expect(mini).toBeDefined();
    if (!mini) {
      return;
    }

    const specs = boardRowSpecs(mini);
    expect(specs).toEqual([
      { category: 'Acme X1 Boards', name: 'Name', value: 'Vendor X1 Mini' },
      { category: 'Acme X1 Boards', name: 'GPU Clock', value: '1500 MHz' },
    ]);
    expect(describeSpecs(specs)).toBe('Name: Vendor X1 Mini | GPU Clock: 1500 MHz');
  });

  it('returns no boards when the section is missing', () => {
    expect(parseBoardsSection(productPage({ name: 'Acme X1', specs: [] }))).toEqual([]);
  });
});

describe('reviews', () => {
  it('keeps only recognized drop-down options, without their page number', () => {
    const html = `<select id="pagesel">
  <option value="/review/vendor-x1-oc/">1- Introduction</option>
  <option value="/review/vendor-x1-oc/4.html">4- Pictures &amp; Teardown</option>
  <option value="/review/vendor-x1-oc/5.html">5- Circuit Board Analysis</option>
  <option>6- Temperatures &amp; Fan Noise</option>
</select>`;

    expect(parseReviewOptions(html)).toEqual([
      { text: 'Pictures & Teardown', originalText: '4- Pictures & Teardown', value: '/review/vendor-x1-oc/4.html' },
      {
        text: 'Circuit Board Analysis',
        originalText: '5- Circuit Board Analysis',
        value: '/review/vendor-x1-oc/5.html',
      },
    ]);
  });

  it('extracts circuit board facts as review data and board specs', () => {
    const content = parseReviewContent(circuitReviewPage(), 'Circuit Board Analysis');

    expect(content?.title).toBe('Circuit Board Analysis');
    expect(content?.body).toBe(
      'A 10+3 phase VRM powers the GPU. It is managed by a Monolithic Power Systems MP2891 controller.\n' +
        'The card weighs 1250 g and uses five heatpipes.'
    );
    expect(content?.images).toEqual([
      { section: 'Circuit Board Analysis', url: '/img/pcb-front.jpg', alt: 'PCB front', kind: 'image' },
    ]);
    expect(content?.data.map((item) => `${item.dataType}|${item.key}|${item.value}|${item.unit}`)).toEqual([
      'Image|Circuit Board Analysis|/img/pcb-front.jpg|URL',
      'GPU|VRM Phases|10+3|phase',
      'GPU|Controller|MP2891|',
      'Weight|Total|1250|g',
      'Heatpipes|Count|5|count',
    ]);
    expect(content?.specs).toEqual([
      { category: 'Circuit Board', name: 'GPU VRM Phases', value: '10+3 phase' },
      { category: 'Circuit Board', name: 'GPU Controller', value: 'MP2891' },
      { category: 'Circuit Board', name: 'Weight Total', value: '1250 g' },
      { category: 'Circuit Board', name: 'Heatpipes Count', value: '5' },
    ]);
  });

  it('reads memory chip facts', () => {
    const content = parseReviewContent(
      circuitReviewPage(
        'The memory chips are made by Samsung, and bear the model number K4ZAF325BC-SC20, they are rated for 20 Gbps.'
      ),
      'PCB Analysis'
    );

    expect(content?.specs).toContainEqual({
      category: 'Circuit Board',
      name: 'Memory Memory Chips',
      value: 'Samsung K4ZAF325BC-SC20 20 Gbps',
    });
  });

  it('reads highlighted result rows of a thermal page', () => {
    const content = parseReviewContent(thermalReviewPage(), 'Temperatures & Fan Noise');

    expect(content?.data).toEqual([
      { dataType: 'Thermal', key: 'Idle', value: '32', unit: '°C', productName: 'Vendor X1 OC' },
      { dataType: 'Thermal', key: 'Gaming', value: '68', unit: '°C', productName: 'Vendor X1 OC' },
    ]);
    expect(content?.specs).toEqual([]);
  });

  it('returns null for a page without a text block', () => {
    expect(parseReviewContent('<html><body><p>Moved</p></body></html>', 'PCB Analysis')).toBeNull();
  });

  it('reads the posted date from markup or text', () => {
    expect(parseReviewPostedDate('<time datetime="2024-01-05T08:00:00Z">Jan 5</time>')).toBe('2024-01-05');
    expect(
      parseReviewPostedDate('<meta property="article:published_time" content="2023-11-20T10:00:00+00:00">')
    ).toBe('2023-11-20');
    expect(parseReviewPostedDate('<span class="date">March 7th, 2024</span>')).toBe('2024-03-07');
    expect(parseReviewPostedDate('<p>no date here</p>')).toBeNull();
  });
});
