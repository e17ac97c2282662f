import type Database from "better-sqlite3";
import {
  aggregateSales,
  countSales,
  findSale,
  listSaleSummaries,
  salesByPeriod,
  topCustomers,
  topProducts,
  type SaleDateRange,
  type SalesAggregateRow,
  type SalesBucketRow,
} from "../database/sales.js";
import { listLowStockRows, toProduct } from "../database/products.js";
import { UnknownSaleError } from "../errors.js";
import type { Product } from "../models/product.js";
import type { Sale, SaleSummary } from "../models/sale.js";
import { averageCents, fromCents } from "../utils/money.js";
import { buildPage, pageOffset, type Page, type PageRequest } from "../utils/pagination.js";
import { daysBefore, isoDay, isoMonth } from "../utils/dates.js";

const TOP_LIMIT = 10;
const DASHBOARD_LIMIT = 5;

export interface SalesTotals {
  count: number;
  total: number;
  average: number;
}

export interface SalesBucket {
  period: string;
  count: number;
  total: number;
}

export interface TopProduct {
  product_id: number;
  name: string;
  units_sold: number;
  revenue: number;
}

export interface TopCustomer {
  customer_id: number;
  customer_name: string;
  purchases: number;
  spent: number;
}

/** A trailing window of whole days, or an explicit inclusive day range. */
export type StatisticsWindow = { days: number } | { from?: string; to?: string };

export interface SalesStatistics {
  days: number | null;
  since: string | null;
  from: string | null;
  to: string | null;
  by_day: SalesBucket[];
  by_month: SalesBucket[];
  top_products: TopProduct[];
  top_customers: TopCustomer[];
  overall: SalesTotals;
  period: SalesTotals;
}

export interface DashboardSummary {
  today: SalesTotals;
  month: SalesTotals;
  low_stock: Product[];
  latest_sales: SaleSummary[];
}

function toTotals(row: SalesAggregateRow): SalesTotals {
  return {
    count: row.count,
    total: fromCents(row.total_cents),
    average: fromCents(averageCents(row.total_cents, row.count)),
  };
}

function toBucket(row: SalesBucketRow): SalesBucket {
  return { period: row.bucket, count: row.count, total: fromCents(row.total_cents) };
}

export class SalesReports {
  constructor(private readonly db: Database.Database) {}

  getSale(saleId: number): Sale {
    const sale = findSale(this.db, saleId);
    if (!sale) {
      throw new UnknownSaleError(saleId);
    }
    return sale;
  }

  listSales(range: SaleDateRange, request: PageRequest): Page<SaleSummary> {
    return buildPage(
      listSaleSummaries(this.db, range, request.pageSize, pageOffset(request)),
      countSales(this.db, range),
      request,
    );
  }

  statistics(window: StatisticsWindow, now: Date = new Date()): SalesStatistics {
    const range: SaleDateRange =
      "days" in window
        ? { since: daysBefore(now, window.days).toISOString() }
        : { from: window.from, to: window.to };

    return {
      days: "days" in window ? window.days : null,
      since: range.since ?? null,
      from: range.from ?? null,
      to: range.to ?? null,
      by_day: salesByPeriod(this.db, range, 10).map(toBucket),
      by_month: salesByPeriod(this.db, range, 7).map(toBucket),
      top_products: topProducts(this.db, range, TOP_LIMIT).map((row) => ({
        product_id: row.product_id,
        name: row.name,
        units_sold: row.units_sold,
        revenue: fromCents(row.revenue_cents),
      })),
      top_customers: topCustomers(this.db, range, TOP_LIMIT).map((row) => ({
        customer_id: row.customer_id,
        customer_name: `${row.first_name} ${row.last_name}`,
        purchases: row.purchases,
        spent: fromCents(row.spent_cents),
      })),
      overall: toTotals(aggregateSales(this.db, {})),
      period: toTotals(aggregateSales(this.db, range)),
    };
  }

  dashboard(now: Date = new Date()): DashboardSummary {
    const today = isoDay(now);
    const monthStart = `${isoMonth(now)}-01`;

    return {
      today: toTotals(aggregateSales(this.db, { from: today, to: today })),
      month: toTotals(aggregateSales(this.db, { from: monthStart, to: today })),
      low_stock: listLowStockRows(this.db, DASHBOARD_LIMIT).map(toProduct),
      latest_sales: listSaleSummaries(this.db, {}, DASHBOARD_LIMIT, 0),
    };
  }
}
