import type Database from "better-sqlite3";
import { authorize, type Actor } from "../auth/actor.js";
import {
  decrementStock,
  findProductRow,
  incrementStock,
  listLowStockRows,
  setStock,
  toProduct,
  type ProductRow,
} from "../database/products.js";
import { insertMovement } from "../database/movements.js";
import { findCustomer } from "../database/customers.js";
import {
  deleteSaleRow,
  findSale,
  findSaleLineRows,
  insertSale,
  insertSaleLine,
  setSaleTotal,
} from "../database/sales.js";
import { withTransaction } from "../database/transaction.js";
import {
  EmptySaleError,
  InsufficientStockError,
  InvalidQuantityError,
  UnknownCustomerError,
  UnknownProductError,
  UnknownSaleError,
} from "../errors.js";
import { moduleLogger } from "../logger.js";
import { MAX_STOCK_QUANTITY, isLowStockLevel, type Product } from "../models/product.js";
import type { MovementKind, StockMovement } from "../models/movement.js";
import { formatSaleCode, type RecordSaleInput, type Sale } from "../models/sale.js";

const log = moduleLogger("stock-ledger");

export interface StockLedgerOptions {
  now?: () => Date;
}

export interface MovementRequest {
  kind: MovementKind;
  quantity: number;
  reason?: string;
}

export interface StockChange {
  product: Product;
  movement: StockMovement | null;
}

function isStockQuantity(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0 && value <= MAX_STOCK_QUANTITY;
}

function isMovementQuantity(value: number): boolean {
  return isStockQuantity(value) && value > 0;
}

/**
 * Owns quantity on hand for every product. All writes go through one
 * immediate transaction each, so a sale either lands completely or leaves
 * every product untouched.
 */
export class StockLedger {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: StockLedgerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  recordSale(actor: Actor, input: RecordSaleInput): Sale {
    authorize(actor, "sales:write");

    if (input.lines.length === 0) {
      throw new EmptySaleError();
    }
    for (const line of input.lines) {
      if (!isMovementQuantity(line.quantity)) {
        throw new InvalidQuantityError(line.quantity, line.product_id);
      }
    }

    const sale = withTransaction(this.db, "recordSale", () => {
      if (!findCustomer(this.db, input.customer_id)) {
        throw new UnknownCustomerError(input.customer_id);
      }

      const createdAt = this.now().toISOString();
      const saleId = insertSale(this.db, input.customer_id, createdAt);
      let totalCents = 0;

      input.lines.forEach((line, index) => {
        // Re-read per line: repeated products see the quantity left by earlier lines
        const product = this.requireProductRow(line.product_id);
        if (line.quantity > product.quantity_on_hand) {
          throw new InsufficientStockError(
            product.product_id,
            product.name,
            product.quantity_on_hand,
            line.quantity,
          );
        }

        if (!decrementStock(this.db, product.product_id, line.quantity, createdAt)) {
          const current = this.requireProductRow(line.product_id);
          throw new InsufficientStockError(
            current.product_id,
            current.name,
            current.quantity_on_hand,
            line.quantity,
          );
        }

        const subtotalCents = line.quantity * product.unit_price_cents;
        insertSaleLine(this.db, {
          sale_id: saleId,
          position: index + 1,
          product_id: product.product_id,
          quantity: line.quantity,
          unit_price_cents: product.unit_price_cents,
          subtotal_cents: subtotalCents,
        });
        totalCents += subtotalCents;
      });

      setSaleTotal(this.db, saleId, totalCents);
      return this.requireSale(saleId);
    });

    log.info(
      {
        saleId: sale.sale_id,
        code: sale.code,
        customerId: sale.customer_id,
        lines: sale.lines.length,
        total: sale.total,
        actor: actor.username,
      },
      "Sale recorded",
    );
    return sale;
  }

  adjustStock(actor: Actor, productId: number, newQuantity: number, reason?: string): StockChange {
    authorize(actor, "stock:write");

    if (!isStockQuantity(newQuantity)) {
      throw new InvalidQuantityError(newQuantity, productId);
    }

    const change = withTransaction(this.db, "adjustStock", () => {
      const product = this.requireProductRow(productId);
      const difference = newQuantity - product.quantity_on_hand;
      if (difference === 0) {
        return { product: toProduct(product), movement: null };
      }

      const createdAt = this.now().toISOString();
      setStock(this.db, productId, newQuantity, createdAt);
      const movement = this.writeMovement(
        productId,
        difference > 0 ? "in" : "out",
        Math.abs(difference),
        reason || "Stock adjustment",
        actor,
        createdAt,
      );
      return { product: toProduct(this.requireProductRow(productId)), movement };
    });

    if (change.movement) {
      log.info(
        { productId, quantity: newQuantity, actor: actor.username },
        "Stock adjusted",
      );
    } else {
      log.debug({ productId }, "Stock adjustment left quantity unchanged");
    }
    return change;
  }

  registerMovement(actor: Actor, productId: number, request: MovementRequest): StockChange {
    authorize(actor, "stock:write");

    if (!isMovementQuantity(request.quantity)) {
      throw new InvalidQuantityError(request.quantity, productId);
    }

    const change = withTransaction(this.db, "registerMovement", () => {
      const product = this.requireProductRow(productId);
      const createdAt = this.now().toISOString();

      if (request.kind === "out") {
        if (!decrementStock(this.db, productId, request.quantity, createdAt)) {
          throw new InsufficientStockError(
            product.product_id,
            product.name,
            product.quantity_on_hand,
            request.quantity,
          );
        }
      } else {
        if (!isStockQuantity(product.quantity_on_hand + request.quantity)) {
          throw new InvalidQuantityError(request.quantity, productId);
        }
        incrementStock(this.db, productId, request.quantity, createdAt);
      }

      const movement = this.writeMovement(
        productId,
        request.kind,
        request.quantity,
        request.reason || (request.kind === "in" ? "Stock entry" : "Stock withdrawal"),
        actor,
        createdAt,
      );
      return { product: toProduct(this.requireProductRow(productId)), movement };
    });

    log.info(
      { productId, kind: request.kind, quantity: request.quantity, actor: actor.username },
      "Stock movement registered",
    );
    return change;
  }

  /** Deletes a sale and puts every sold unit back on the shelf in the same transaction. */
  deleteSale(actor: Actor, saleId: number): Sale {
    authorize(actor, "sales:write");

    const sale = withTransaction(this.db, "deleteSale", () => {
      const existing = findSale(this.db, saleId);
      if (!existing) {
        throw new UnknownSaleError(saleId);
      }

      const createdAt = this.now().toISOString();
      const reason = `Sale ${formatSaleCode(saleId)} deleted`;
      for (const line of findSaleLineRows(this.db, saleId)) {
        incrementStock(this.db, line.product_id, line.quantity, createdAt);
        this.writeMovement(line.product_id, "in", line.quantity, reason, actor, createdAt);
      }

      deleteSaleRow(this.db, saleId);
      return existing;
    });

    log.info(
      { saleId, code: sale.code, restoredLines: sale.lines.length, actor: actor.username },
      "Sale deleted and stock restored",
    );
    return sale;
  }

  isLowStock(productId: number): boolean {
    return isLowStockLevel(this.requireProductRow(productId));
  }

  /** Most urgent first: ascending quantity, ties by product id. */
  listLowStock(limit?: number): Product[] {
    return listLowStockRows(this.db, limit).map(toProduct);
  }

  private requireProductRow(productId: number): ProductRow {
    const product = findProductRow(this.db, productId);
    if (!product) {
      throw new UnknownProductError(productId);
    }
    return product;
  }

  private requireSale(saleId: number): Sale {
    const sale = findSale(this.db, saleId);
    if (!sale) {
      throw new UnknownSaleError(saleId);
    }
    return sale;
  }

  private writeMovement(
    productId: number,
    kind: MovementKind,
    quantity: number,
    reason: string,
    actor: Actor,
    createdAt: string,
  ): StockMovement {
    const movement = {
      product_id: productId,
      kind,
      quantity,
      reason,
      actor: actor.username,
      created_at: createdAt,
    };
    const movementId = insertMovement(this.db, movement);
    return { movement_id: movementId, ...movement };
  }
}
