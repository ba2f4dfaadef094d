/**
 * CSS selectors and patterns for the auction price table page
 *
 * Page layout:
 *   table.tab_pre_sub   header table, name cell on the left, date cell on the right
 *   table.tab_pre_pro   products table, family header rows interleaved with
 *                       product rows; each product row has one td.txt per cut
 */

export interface AuctionPageSelectors {
  productsTable: string;
  familyRowClass: string;
  familyCell: string;
  productCell: string;
  priceCell: string;
  auctionName: string;
  tableDate: string;
}

export const auctionPageSelectors: AuctionPageSelectors = {
  productsTable: 'table.tab_pre_pro',
  familyRowClass: 'familias_subasta',
  // Family cells carry numbered classes (fam1, fam2, ...)
  familyCell: "td[class^='fam']",
  productCell: 'td.pro',
  priceCell: 'td.txt',
  auctionName: 'table.tab_pre_sub td.titNombreizq',
  tableDate: 'table.tab_pre_sub td.titNombreder',
};

/**
 * Raw-text marker of the products table, used before any parsing
 */
export const PRODUCTS_TABLE_MARKER = 'tab_pre_pro';

/**
 * Row-level navigation: onclick="window.location='/precio/...'"
 */
export const PRODUCT_URL_PATTERN = /window\.location\s*=\s*'([^']+)'/;

/**
 * Cell text meaning "no price for this cut"
 */
export const EMPTY_PRICE_PLACEHOLDERS: readonly string[] = ['', '-'];

/**
 * The slice of a parsed DOM node that cell text reads
 */
export interface MarkupNode {
  type: string;
  data?: string;
  children?: MarkupNode[];
}

/**
 * Text of a table cell: each descendant text node trimmed, empty ones
 * dropped, the rest joined with one space. `<a>Novillo</a><br>Primera`
 * reads as "Novillo Primera".
 */
export function cellText(nodes: readonly MarkupNode[]): string {
  const parts: string[] = [];
  const visit = (node: MarkupNode): void => {
    if (node.type === 'text') {
      const text = (node.data ?? '').trim();
      if (text) parts.push(text);
      return;
    }
    node.children?.forEach(visit);
  };

  nodes.forEach(visit);
  return parts.join(' ');
}
