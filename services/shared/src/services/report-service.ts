import { PoolClient } from 'pg';
import {
     DamagedStockRow,
     ProductProfitRow,
     ProductSalesRow,
     ReportPeriod,
     SummaryReport,
     TopProductRow,
} from '../types/billing.types';
import { ValidationError } from '../utils/errors';
import { fromMinorUnits, toMinorUnits } from '../utils/money';

export const REPORT_PERIODS: readonly ReportPeriod[] = ['daily', 'weekly', 'monthly'];

const PERIOD_FILTERS: Record<ReportPeriod, string> = {
     daily: `i.created_at >= date_trunc('day', NOW())`,
     weekly: `i.created_at >= NOW() - INTERVAL '7 days'`,
     monthly: `i.created_at >= NOW() - INTERVAL '30 days'`,
};

// Voided invoices are excluded from every figure
function invoiceFilter(period: ReportPeriod): string {
     return `i.status = 'ISSUED' AND ${PERIOD_FILTERS[period]}`;
}

function money(value: string | number | null): number {
     return fromMinorUnits(toMinorUnits(value ?? 0));
}

function count(value: string | number | null): number {
     return parseInt(String(value ?? 0), 10);
}

export function parseReportPeriod(value: string): ReportPeriod {
     const period = REPORT_PERIODS.find((p) => p === value);
     if (!period) {
          throw new ValidationError(
               `Period must be one of ${REPORT_PERIODS.join(', ')}`,
               'INVALID_PERIOD'
          );
     }
     return period;
}

interface ProductGroupRow {
     product_name: string;
     weight: string;
     full_product_name: string;
}

/**
 * Read-only aggregates over issued invoices and current damaged stock. Profit
 * is computed against each product's current cost price.
 */
export class ReportService {
     async getSummary(client: PoolClient, period: ReportPeriod): Promise<SummaryReport> {
          const { rows } = await client.query<{
               total_invoices: string;
               total_revenue: string;
               unique_customers: string;
          }>(
               `
      SELECT
        COUNT(*) AS total_invoices,
        COALESCE(SUM(i.total_amount), 0) AS total_revenue,
        COUNT(DISTINCT i.customer_name) AS unique_customers
      FROM invoice i
      WHERE ${invoiceFilter(period)}
    `
          );

          const { rows: itemRows } = await client.query<{
               total_products_sold: string;
               total_profit: string;
          }>(
               `
      SELECT
        COALESCE(SUM(ii.quantity), 0) AS total_products_sold,
        COALESCE(SUM(ii.quantity * (ii.unit_price - p.cost_price)), 0) AS total_profit
      FROM invoice_item ii
      JOIN invoice i ON i.id = ii.invoice_id
      JOIN product p ON p.id = ii.product_id
      WHERE ${invoiceFilter(period)}
    `
          );

          const { rows: damagedRows } = await client.query<{
               total_damaged_units: string;
               damaged_value: string;
          }>(
               `
      SELECT
        COALESCE(SUM(damaged_quantity), 0) AS total_damaged_units,
        COALESCE(SUM(damaged_quantity * cost_price), 0) AS damaged_value
      FROM product
      WHERE damaged_quantity > 0
    `
          );

          return {
               period,
               totalInvoices: count(rows[0].total_invoices),
               totalRevenue: money(rows[0].total_revenue),
               totalProfit: money(itemRows[0].total_profit),
               totalProductsSold: count(itemRows[0].total_products_sold),
               uniqueCustomers: count(rows[0].unique_customers),
               totalDamagedUnits: count(damagedRows[0].total_damaged_units),
               damagedValue: money(damagedRows[0].damaged_value),
          };
     }

     async getSalesByProduct(client: PoolClient, period: ReportPeriod): Promise<ProductSalesRow[]> {
          const { rows } = await client.query<
               ProductGroupRow & {
                    total_quantity: string;
                    total_revenue: string;
                    times_sold: string;
                    average_price: string;
               }
          >(
               `
      SELECT
        p.product_name,
        p.weight,
        p.full_product_name,
        SUM(ii.quantity) AS total_quantity,
        SUM(ii.line_total) AS total_revenue,
        COUNT(ii.id) AS times_sold,
        ROUND(AVG(ii.unit_price), 2) AS average_price
      FROM invoice_item ii
      JOIN invoice i ON i.id = ii.invoice_id
      JOIN product p ON p.id = ii.product_id
      WHERE ${invoiceFilter(period)}
      GROUP BY p.id
      ORDER BY total_quantity DESC, p.full_product_name
    `
          );

          return rows.map((row) => ({
               productName: row.product_name,
               weight: row.weight,
               fullProductName: row.full_product_name,
               totalQuantity: count(row.total_quantity),
               totalRevenue: money(row.total_revenue),
               timesSold: count(row.times_sold),
               averagePrice: money(row.average_price),
          }));
     }

     async getProfitByProduct(client: PoolClient, period: ReportPeriod): Promise<ProductProfitRow[]> {
          const { rows } = await client.query<
               ProductGroupRow & {
                    total_sold: string;
                    total_revenue: string;
                    total_cost: string;
                    profit: string;
               }
          >(
               `
      SELECT
        p.product_name,
        p.weight,
        p.full_product_name,
        SUM(ii.quantity) AS total_sold,
        SUM(ii.line_total) AS total_revenue,
        SUM(ii.quantity * p.cost_price) AS total_cost,
        SUM(ii.line_total) - SUM(ii.quantity * p.cost_price) AS profit
      FROM invoice_item ii
      JOIN invoice i ON i.id = ii.invoice_id
      JOIN product p ON p.id = ii.product_id
      WHERE ${invoiceFilter(period)}
      GROUP BY p.id
      ORDER BY profit DESC, p.full_product_name
    `
          );

          return rows.map((row) => ({
               productName: row.product_name,
               weight: row.weight,
               fullProductName: row.full_product_name,
               totalSold: count(row.total_sold),
               totalRevenue: money(row.total_revenue),
               totalCost: money(row.total_cost),
               profit: money(row.profit),
          }));
     }

     async getTopProducts(
          client: PoolClient,
          period: ReportPeriod,
          limit: number = 10
     ): Promise<TopProductRow[]> {
          const { rows } = await client.query<
               ProductGroupRow & {
                    total_sold: string;
                    total_revenue: string;
                    times_ordered: string;
               }
          >(
               `
      SELECT
        p.product_name,
        p.weight,
        p.full_product_name,
        SUM(ii.quantity) AS total_sold,
        SUM(ii.line_total) AS total_revenue,
        COUNT(DISTINCT ii.invoice_id) AS times_ordered
      FROM invoice_item ii
      JOIN invoice i ON i.id = ii.invoice_id
      JOIN product p ON p.id = ii.product_id
      WHERE ${invoiceFilter(period)}
      GROUP BY p.id
      ORDER BY total_sold DESC, p.full_product_name
      LIMIT $1
    `,
               [Math.min(Math.max(limit, 1), 100)]
          );

          return rows.map((row) => ({
               productName: row.product_name,
               weight: row.weight,
               fullProductName: row.full_product_name,
               totalSold: count(row.total_sold),
               totalRevenue: money(row.total_revenue),
               timesOrdered: count(row.times_ordered),
          }));
     }

     async getDamagedStock(client: PoolClient): Promise<DamagedStockRow[]> {
          const { rows } = await client.query<
               ProductGroupRow & {
                    quantity: number;
                    damaged_quantity: number;
                    cost_price: string;
                    selling_price: string;
                    value_lost: string;
                    updated_at: Date;
               }
          >(
               `
      SELECT
        product_name,
        weight,
        full_product_name,
        quantity,
        damaged_quantity,
        cost_price,
        selling_price,
        damaged_quantity * cost_price AS value_lost,
        updated_at
      FROM product
      WHERE damaged_quantity > 0
      ORDER BY damaged_quantity DESC, full_product_name
    `
          );

          return rows.map((row) => ({
               productName: row.product_name,
               weight: row.weight,
               fullProductName: row.full_product_name,
               availableQuantity: count(row.quantity),
               damagedQuantity: count(row.damaged_quantity),
               costPrice: money(row.cost_price),
               sellingPrice: money(row.selling_price),
               valueLost: money(row.value_lost),
               updatedAt: row.updated_at,
          }));
     }
}
