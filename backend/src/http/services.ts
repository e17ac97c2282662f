import type Database from "better-sqlite3";
import { ProductCatalog } from "../catalog/product-catalog.js";
import { CustomerDirectory } from "../customers/customer-directory.js";
import { StockLedger } from "../ledger/stock-ledger.js";
import { SalesReports } from "../reports/sales-reports.js";

export interface Services {
  ledger: StockLedger;
  catalog: ProductCatalog;
  customers: CustomerDirectory;
  reports: SalesReports;
  now: () => Date;
}

export function createServices(db: Database.Database, now: () => Date = () => new Date()): Services {
  return {
    ledger: new StockLedger(db, { now }),
    catalog: new ProductCatalog(db, { now }),
    customers: new CustomerDirectory(db, { now }),
    reports: new SalesReports(db),
    now,
  };
}
