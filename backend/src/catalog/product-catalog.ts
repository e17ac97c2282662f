import type Database from "better-sqlite3";
import { authorize, type Actor } from "../auth/actor.js";
import {
  countProducts,
  countSaleLinesForProduct,
  deleteProductRow,
  findProductRow,
  insertProduct,
  listProductRows,
  toProduct,
  updateProductFields,
  type ProductFilter,
} from "../database/products.js";
import { insertMovement, recentMovements } from "../database/movements.js";
import { withTransaction } from "../database/transaction.js";
import { ProductInUseError, UnknownProductError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import type { StockMovement } from "../models/movement.js";
import {
  CreateProductInputSchema,
  UpdateProductInputSchema,
  isLowStockLevel,
  type CreateProductInput,
  type Product,
  type UpdateProductInput,
} from "../models/product.js";
import { parseInput } from "../models/validation.js";
import { toCents } from "../utils/money.js";
import { buildPage, pageOffset, type Page, type PageRequest } from "../utils/pagination.js";

const log = moduleLogger("catalog");

const RECENT_MOVEMENTS = 10;

export interface ProductDetail extends Product {
  is_low_stock: boolean;
  movements: StockMovement[];
}

export interface ProductCatalogOptions {
  now?: () => Date;
}

export class ProductCatalog {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: ProductCatalogOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  createProduct(actor: Actor, request: CreateProductInput): Product {
    authorize(actor, "catalog:write");
    const input = parseInput(CreateProductInputSchema, request);

    const product = withTransaction(this.db, "createProduct", () => {
      const createdAt = this.now().toISOString();
      const productId = insertProduct(this.db, {
        name: input.name,
        description: input.description,
        unit_price_cents: toCents(input.unit_price),
        quantity_on_hand: input.quantity_on_hand,
        low_stock_threshold: input.low_stock_threshold,
        created_at: createdAt,
      });

      if (input.quantity_on_hand > 0) {
        insertMovement(this.db, {
          product_id: productId,
          kind: "in",
          quantity: input.quantity_on_hand,
          reason: "Initial stock",
          actor: actor.username,
          created_at: createdAt,
        });
      }
      return this.requireProduct(productId);
    });

    log.info({ productId: product.product_id, actor: actor.username }, "Product created");
    return product;
  }

  updateProduct(actor: Actor, productId: number, request: UpdateProductInput): Product {
    authorize(actor, "catalog:write");
    const input = parseInput(UpdateProductInputSchema, request);

    const updated = updateProductFields(
      this.db,
      productId,
      {
        name: input.name,
        description: input.description,
        unit_price_cents: input.unit_price === undefined ? undefined : toCents(input.unit_price),
        low_stock_threshold: input.low_stock_threshold,
      },
      this.now().toISOString(),
    );
    if (!updated) {
      throw new UnknownProductError(productId);
    }

    log.info({ productId, fields: Object.keys(input), actor: actor.username }, "Product updated");
    return this.requireProduct(productId);
  }

  /** Returns the image path previously stored, if any, so the caller can discard the file. */
  setProductImage(actor: Actor, productId: number, imagePath: string): string | null {
    authorize(actor, "catalog:write");

    return withTransaction(this.db, "setProductImage", () => {
      const existing = findProductRow(this.db, productId);
      if (!existing) {
        throw new UnknownProductError(productId);
      }
      updateProductFields(
        this.db,
        productId,
        { image_path: imagePath },
        this.now().toISOString(),
      );
      log.info({ productId, imagePath, actor: actor.username }, "Product image stored");
      return existing.image_path;
    });
  }

  /** Returns the deleted product; products already sold are kept for the sales history. */
  deleteProduct(actor: Actor, productId: number): Product {
    authorize(actor, "catalog:write");

    const product = withTransaction(this.db, "deleteProduct", () => {
      const existing = this.requireProduct(productId);
      if (countSaleLinesForProduct(this.db, productId) > 0) {
        throw new ProductInUseError(productId);
      }
      deleteProductRow(this.db, productId);
      return existing;
    });

    log.info({ productId, actor: actor.username }, "Product deleted");
    return product;
  }

  getProduct(productId: number): ProductDetail {
    const product = this.requireProduct(productId);
    return {
      ...product,
      is_low_stock: isLowStockLevel(product),
      movements: recentMovements(this.db, productId, RECENT_MOVEMENTS),
    };
  }

  listProducts(filter: ProductFilter, request: PageRequest): Page<Product> {
    const items = listProductRows(this.db, filter, request.pageSize, pageOffset(request)).map(
      toProduct,
    );
    return buildPage(items, countProducts(this.db, filter), request);
  }

  private requireProduct(productId: number): Product {
    const row = findProductRow(this.db, productId);
    if (!row) {
      throw new UnknownProductError(productId);
    }
    return toProduct(row);
  }
}
