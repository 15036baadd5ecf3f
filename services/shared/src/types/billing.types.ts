// Type definitions for domain models

export interface ProductKey {
     productName: string;
     /** Size or weight variant; empty string when the product has none. */
     weight: string;
}

export interface Product extends ProductKey {
     id: number;
     fullProductName: string;
     quantity: number;
     damagedQuantity: number;
     costPrice: number;
     sellingPrice: number;
     createdAt: Date;
     updatedAt: Date;
}

export interface NewProduct {
     productName: string;
     weight?: string;
     quantity: number;
     costPrice?: number;
     sellingPrice: number;
}

export interface ProductUpdate {
     quantity?: number;
     costPrice?: number;
     sellingPrice?: number;
}

export type StockMovementType =
     | 'RECEIPT'
     | 'INVOICE_SALE'
     | 'INVOICE_VOID'
     | 'DAMAGE_MARKED'
     | 'DAMAGE_RESTORED'
     | 'ADJUSTMENT';

export interface StockMovement {
     id: number;
     productId: number;
     type: StockMovementType;
     quantityDelta: number;
     damagedDelta: number;
     referenceId?: string;
     metadata?: Record<string, unknown>;
     createdAt: Date;
}

export interface Customer {
     name: string;
     phone?: string;
     address?: string;
}

export interface InvoiceLineRequest {
     productName: string;
     weight?: string;
     quantity: number;
}

export interface CreateInvoiceRequest {
     customer: Customer;
     lines: InvoiceLineRequest[];
}

export type InvoiceStatus = 'ISSUED' | 'VOIDED';

export type InvoiceStage =
     | 'VALIDATING'
     | 'PRICING'
     | 'RESERVING'
     | 'NUMBERING'
     | 'PERSISTING'
     | 'COMMITTED';

export interface InvoiceTotals {
     subtotal: number;
     cgstRate: number;
     sgstRate: number;
     cgst: number;
     sgst: number;
     total: number;
}

export interface InvoiceItem {
     lineNumber: number;
     productId: number;
     productName: string;
     weight: string;
     fullProductName: string;
     quantity: number;
     unitPrice: number;
     lineTotal: number;
}

export interface InvoiceSummary extends InvoiceTotals {
     id: number;
     invoiceNumber: number;
     displayNumber: string;
     status: InvoiceStatus;
     customer: Customer;
     createdAt: Date;
     voidedAt?: Date;
     voidReason?: string;
}

export interface Invoice extends InvoiceSummary {
     items: InvoiceItem[];
}

export interface InvoiceQuote extends InvoiceTotals {
     items: Array<Omit<InvoiceItem, 'productId'>>;
}

export interface DamageMovementResult {
     product: Product;
     quantity: number;
}

// Reports

export type ReportPeriod = 'daily' | 'weekly' | 'monthly';

export interface SummaryReport {
     period: ReportPeriod;
     totalInvoices: number;
     totalRevenue: number;
     totalProfit: number;
     totalProductsSold: number;
     uniqueCustomers: number;
     totalDamagedUnits: number;
     damagedValue: number;
}

export interface ProductSalesRow {
     fullProductName: string;
     productName: string;
     weight: string;
     totalQuantity: number;
     totalRevenue: number;
     timesSold: number;
     averagePrice: number;
}

export interface ProductProfitRow {
     fullProductName: string;
     productName: string;
     weight: string;
     totalSold: number;
     totalRevenue: number;
     totalCost: number;
     profit: number;
}

export interface TopProductRow {
     fullProductName: string;
     productName: string;
     weight: string;
     totalSold: number;
     totalRevenue: number;
     timesOrdered: number;
}

export interface DamagedStockRow {
     fullProductName: string;
     productName: string;
     weight: string;
     availableQuantity: number;
     damagedQuantity: number;
     costPrice: number;
     sellingPrice: number;
     valueLost: number;
     updatedAt: Date;
}

// Domain events

export interface DomainEvent {
     id: number;
     type: string;
     payload: Record<string, unknown>;
     status: 'PENDING' | 'SENT' | 'FAILED';
     createdAt: Date;
}

export interface InvoiceCreatedEvent {
     invoiceNumber: number;
     customerName: string;
     total: number;
     lines: Array<{ productId: number; quantity: number; unitPrice: number }>;
     timestamp: string;
}

export interface StockDamageEvent {
     productId: number;
     fullProductName: string;
     quantity: number;
     newQuantity: number;
     newDamagedQuantity: number;
     reason?: string;
     timestamp: string;
}

export interface InvoiceVoidedEvent {
     invoiceNumber: number;
     reason: string;
     timestamp: string;
}

export interface DomainEventPayloads {
     InvoiceCreated: InvoiceCreatedEvent;
     InvoiceVoided: InvoiceVoidedEvent;
     StockDamaged: StockDamageEvent;
     StockRestored: StockDamageEvent;
}

export type DomainEventType = keyof DomainEventPayloads;
