export const HEADER_FIELDS = [
  "CUST-ORDER",
  "CUST-ADDR-CODE",
  "CUST-ADDR-NAME",
  "CUST-ADDR-ADDRESS1",
  "CUST-ADDR-ADDRESS2",
  "CUST-ADDR-ADDRESS3",
  "DELIVERY-DUE-DATE",
  "DELIVERY-TO-CODE",
  "DELIVERY-TO-NAME",
  "DELIVERY-TO-ADDRESS1",
  "INVOICE-TO-CODE",
  "INVOICE-TO-NAME",
  "INVOICE-TO-ADDRESS1",
  "TOTAL-ORDER-UNITS",
  "TOTAL-ORDER-VALUE",
] as const;

export const LINE_ITEM_FIELDS = [
  "LINE-NO",
  "LINE-CODE",
  "LINE-DESC",
  "LINE-QUANT",
  "LINE-PRICE",
  "LINE-TOTAL-AMOUNT",
] as const;

export const SENTINELS = {
  headerStart: "###ORD-HEADER",
  headerEnd: "###ORD-HEADER-END",
  linesStart: "###ORD-LINES",
  linesEnd: "###ORD-LINES-END",
} as const;

export type SentinelName = keyof typeof SENTINELS;
