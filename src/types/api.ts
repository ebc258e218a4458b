/**
 * MYOB AccountRight API payloads
 * Only the fields this tool reads are typed; everything else passes through.
 */

export type JsonObject = Record<string, unknown>;

/**
 * Paged list envelope
 */
export interface PagedResponse<T> {
  Items: T[];
  NextPageLink?: string | null;
  Count?: number;
}

export interface EntityRef {
  UID: string;
  Name?: string;
  DisplayID?: string;
}

export interface CompanyFile extends JsonObject {
  Id: string;
  Name: string;
  LibraryPath?: string;
  ProductVersion?: string;
  Uri?: string;
}

export interface Contact extends JsonObject {
  UID: string;
  CompanyName?: string;
  FirstName?: string;
  LastName?: string;
  IsIndividual?: boolean;
  IsActive?: boolean;
  Type?: string;
}

export interface DocumentLine {
  Description: string;
  Quantity: number;
  UnitPrice: number;
  Account: { UID: string };
  TaxCode?: { UID: string };
}

/**
 * Sale invoice or purchase bill
 */
export interface LedgerDocument extends JsonObject {
  UID: string;
  Number?: string;
  Date?: string;
  Status?: string;
  Subtotal?: number;
  TotalTax?: number;
  TotalAmount?: number;
  BalanceDueAmount?: number;
  IsTaxInclusive?: boolean;
}

/**
 * Sales order line. Item layout carries quantity and price; Service layout only a total.
 */
export interface SalesOrderLine {
  Type: 'Transaction';
  Description: string;
  ShipQuantity?: number;
  UnitPrice?: number;
  Total: number;
  Account: { UID: string };
  TaxCode?: { UID: string };
}

export interface SalesOrder extends LedgerDocument {
  Layout?: string;
  /** Required on PUT; MYOB rejects an update against a stale version */
  RowVersion?: string;
}

export interface Account extends JsonObject {
  UID: string;
  Name: string;
  DisplayID?: string;
  Type?: string;
  IsActive?: boolean;
  CurrentBalance?: number;
}

export interface TaxCode extends JsonObject {
  UID: string;
  Code: string;
  Description?: string;
  Type?: string;
  Rate?: number;
}

export interface Job extends JsonObject {
  UID: string;
  Number?: string;
  Name?: string;
  IsActive?: boolean;
}

export interface BankTransaction extends JsonObject {
  UID: string;
  Date?: string;
  Amount?: number;
  Memo?: string;
}
