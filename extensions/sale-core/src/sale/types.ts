/** Amount of a single denomination. `amount` is a decimal u128 string. */
export type Coin = {
  denom: string;
  amount: string;
};

/** Where proceeds go. `msg` is forwarded verbatim with the payment when present. */
export type Recipient = {
  address: string;
  msg?: string;
};

export type SaleConfiguration = {
  itemSource: string;
  canMintAfterSale: boolean;
  owner: string;
  createdAt: string;
  updatedAt: string;
};

export type TokenRecord = {
  tokenId: string;
  available: true;
  registeredAt: string;
};

export type SaleOutcome = "refund" | "settle";

export type SaleState = {
  saleId: string;
  /** Unix milliseconds. */
  startTime: number;
  /** Unix milliseconds. */
  endTime: number;
  price: Coin;
  minTokensSold: string;
  maxAmountPerWallet: number;
  amountSold: string;
  /** Net proceeds accumulated for the recipient. */
  amountToSend: string;
  /** Net proceeds already forwarded to the recipient. */
  amountTransferred: string;
  itemsDelivered: string;
  /** Items available when the sale opened. */
  totalTokens: string;
  recipient: Recipient;
  /** Optional end rule: sale may end once this percentage of `totalTokens` is sold. */
  targetPercentageSold?: number;
  /** Optional end rule: sale may end once this many milliseconds elapsed since start. */
  maxDurationMs?: number;
  endedAt?: string;
  outcome?: SaleOutcome;
  createdAt: string;
  updatedAt: string;
};

export type PaymentPurpose = "refund" | "proceeds" | "overpayment_refund" | "split";

export type PaymentMessage = {
  kind: "payment";
  purpose: PaymentPurpose;
  recipient: string;
  amount: Coin[];
  msg?: string;
};

export type ItemMintMessage = {
  kind: "item_mint";
  itemSource: string;
  tokenId: string;
  owner: string;
  tokenUri?: string;
  extension?: Record<string, unknown>;
};

export type ItemTransferMessage = {
  kind: "item_transfer";
  itemSource: string;
  tokenId: string;
  recipient: string;
};

export type ItemBurnMessage = {
  kind: "item_burn";
  itemSource: string;
  tokenId: string;
};

/** Outbound command issued as a side effect of a committed call. */
export type SaleMessage = PaymentMessage | ItemMintMessage | ItemTransferMessage | ItemBurnMessage;

export type Purchase = {
  tokenId: string;
  taxAmount: string;
  /** Split payments captured at purchase time, disbursed on delivery. */
  messages: PaymentMessage[];
  purchaser: string;
  purchasedAt: string;
};

export type PurchaseLedgerEntry = {
  purchaser: string;
  purchases: Purchase[];
};

export type MintRecord = {
  tokenId: string;
  owner?: string;
  tokenUri?: string;
  extension?: Record<string, unknown>;
};

export type SalePhase = "no_sale" | "active" | "ended" | "draining";

/** Result of every mutating engine call. */
export type SaleResponse = {
  action: string;
  messages: SaleMessage[];
  attributes: Record<string, string>;
};

export type AuditEventKind =
  | "config_initialized"
  | "item_source_updated"
  | "items_minted"
  | "sale_opened"
  | "purchase_recorded"
  | "sale_ended"
  | "refund_issued"
  | "proceeds_forwarded"
  | "items_delivered"
  | "items_burned"
  | "sale_cleared";

export type AuditEvent = {
  id: string;
  kind: AuditEventKind;
  refId: string;
  actor?: string;
  timestamp: string;
  details?: Record<string, unknown>;
};

export type AvailableItemsFilter = {
  startAfter?: string;
  limit?: number;
};
