import type { DividendTagFamily } from "./dividend";

export type DividendTagDefinition = {
  namespace: string;
  tag: string;
  family: DividendTagFamily;
  perShare: boolean;
};

/**
 * Allow-listed XBRL tags known to carry dividend figures, in extraction order.
 */
export const dividendTagCatalog: readonly DividendTagDefinition[] = [
  {
    namespace: "us-gaap",
    tag: "CommonStockDividendsPerShareDeclared",
    family: "declared",
    perShare: true,
  },
  {
    namespace: "us-gaap",
    tag: "CommonStockDividendsPerShareCashPaid",
    family: "paid",
    perShare: true,
  },
  {
    namespace: "us-gaap",
    tag: "DividendsCommonStock",
    family: "total",
    perShare: false,
  },
  {
    namespace: "us-gaap",
    tag: "DividendsCommonStockCash",
    family: "total",
    perShare: false,
  },
];

/**
 * Lower wins when several tags report the same ex-date. Paid and total tie.
 */
export const tagFamilyPriority: Record<DividendTagFamily, number> = {
  declared: 0,
  paid: 1,
  total: 1,
};

/**
 * Unknown tags rank with the lowest-priority family.
 */
export const familyPriorityOfTag = (tag: string): number => {
  const definition = dividendTagCatalog.find((entry) => entry.tag === tag);
  return definition
    ? tagFamilyPriority[definition.family]
    : Math.max(...Object.values(tagFamilyPriority));
};
