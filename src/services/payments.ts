/**
 * Payments Service
 * Customer payments against invoices, and deposits against sales orders.
 * Both post to /Sale/CustomerPayment and leave the documents they apply to stale.
 */

import { ValidationError } from '../lib/errors.js';
import { assertGuid, assertIsoDate } from '../lib/odata.js';
import type { RequestExecutor, RequestScope, WriteResult } from './api.js';
import type { JsonObject } from '../types/api.js';

export const CUSTOMER_PAYMENT_PATH = '/Sale/CustomerPayment';

export const PAYMENT_METHODS = ['BankDeposit', 'Cash', 'Cheque', 'CreditCard', 'ElectronicPayments'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export function isPaymentMethod(value: string): value is PaymentMethod {
  return PAYMENT_METHODS.some((method) => method === value);
}

export interface InvoiceApplication {
  invoiceId: string;
  amountApplied: number;
}

interface PaymentBase {
  customerId: string;
  date: string;
  amount: number;
  /** Bank account the money is deposited to */
  bankAccountId: string;
  memo?: string;
  /** Default: BankDeposit */
  paymentMethod?: string;
}

export interface NewCustomerPayment extends PaymentBase {
  invoices: InvoiceApplication[];
}

export interface NewSalesOrderDeposit extends PaymentBase {
  salesOrderId: string;
}

/**
 * Parse `invoiceUid:amount`
 * @example parseInvoiceApplication('<invoice uid>:150.00')
 */
export function parseInvoiceApplication(input: string): InvoiceApplication {
  const separator = input.lastIndexOf(':');
  const invoiceId = input.slice(0, separator).trim();
  const amountText = input.slice(separator + 1).trim();
  const amountApplied = Number(amountText);

  if (separator === -1 || !amountText || !Number.isFinite(amountApplied)) {
    throw new ValidationError(`Invalid invoice application '${input}'. Expected "invoiceUid:amount".`, 'apply');
  }
  assertGuid(invoiceId, 'apply');
  return { invoiceId, amountApplied };
}

function positiveAmount(value: number, param: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`Invalid ${param}: '${value}'. Expected a positive amount.`, param);
  }
  return value;
}

export class PaymentsService {
  private readonly executor: RequestExecutor;

  constructor(executor: RequestExecutor) {
    this.executor = executor;
  }

  /**
   * Record money received and apply it to outstanding invoices
   */
  async createCustomerPayment(payment: NewCustomerPayment, scope: RequestScope = {}): Promise<WriteResult> {
    if (payment.invoices.length === 0) {
      throw new ValidationError('At least one invoice is required', 'apply');
    }
    const body = this.paymentBody(payment);
    body.Invoices = payment.invoices.map((invoice) => ({
      UID: assertGuid(invoice.invoiceId, 'apply'),
      AmountApplied: positiveAmount(invoice.amountApplied, 'apply'),
    }));

    return this.executor.executeWrite('POST', CUSTOMER_PAYMENT_PATH, { ...scope, body, invalidates: ['invoices'] });
  }

  /**
   * Record a customer deposit against a sales order; the whole amount is applied to the order
   */
  async createSalesOrderDeposit(deposit: NewSalesOrderDeposit, scope: RequestScope = {}): Promise<WriteResult> {
    const body = this.paymentBody(deposit);
    body.DepositTo = 'Account';
    body.Invoices = [
      {
        UID: assertGuid(deposit.salesOrderId, 'order'),
        Type: 'Order',
        AmountApplied: deposit.amount,
      },
    ];

    return this.executor.executeWrite('POST', CUSTOMER_PAYMENT_PATH, {
      ...scope,
      body,
      invalidates: ['sales-orders'],
    });
  }

  private paymentBody(payment: PaymentBase): JsonObject {
    assertGuid(payment.customerId, 'customer');
    assertIsoDate(payment.date, 'date');
    assertGuid(payment.bankAccountId, 'account');
    positiveAmount(payment.amount, 'amount');

    const method = payment.paymentMethod ?? 'BankDeposit';
    if (!isPaymentMethod(method)) {
      throw new ValidationError(
        `Invalid payment method: '${method}'. Expected one of ${PAYMENT_METHODS.join(', ')}.`,
        'method'
      );
    }

    const body: JsonObject = {
      Customer: { UID: payment.customerId },
      Date: payment.date,
      AmountReceived: payment.amount,
      Account: { UID: payment.bankAccountId },
      PaymentMethod: method,
    };
    if (payment.memo) {
      body.Memo = payment.memo;
    }
    return body;
  }
}
