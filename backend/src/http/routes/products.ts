import { Router } from "express";
import type multer from "multer";
import { resolveActor, requirePermission } from "../actor.js";
import { removeStoredImage } from "../upload.js";
import type { Services } from "../services.js";
import { ValidationError } from "../../errors.js";
import {
  AdjustStockInputSchema,
  RegisterMovementInputSchema,
} from "../../models/movement.js";
import {
  CreateProductInputSchema,
  ProductListQuerySchema,
  UpdateProductInputSchema,
} from "../../models/product.js";
import { parseId, parseInput } from "../../models/validation.js";
import { pageBody, pageRequest } from "./pagination.js";

export interface ProductRouterOptions {
  upload: multer.Multer;
  uploadDir: string;
  pageSize: number;
}

export function productRouter(services: Services, options: ProductRouterOptions): Router {
  const router: Router = Router();
  const { catalog, ledger } = services;

  router.get("/", (req, res) => {
    resolveActor(req);
    const query = parseInput(ProductListQuerySchema, req.query);
    const page = catalog.listProducts(
      { lowStockOnly: query.low_stock, search: query.search },
      pageRequest(query.page, query.page_size, options.pageSize),
    );
    res.json(pageBody("products", page));
  });

  // Registered before /:id so the literal segment wins
  router.get("/low-stock", (req, res) => {
    resolveActor(req);
    res.json({ products: ledger.listLowStock() });
  });

  router.get("/:id", (req, res) => {
    resolveActor(req);
    res.json({ product: catalog.getProduct(parseId(req.params.id)) });
  });

  router.post("/", (req, res) => {
    const actor = resolveActor(req);
    const input = parseInput(CreateProductInputSchema, req.body);
    res.status(201).json({ product: catalog.createProduct(actor, input) });
  });

  router.patch("/:id", (req, res) => {
    const actor = resolveActor(req);
    const productId = parseId(req.params.id);
    const input = parseInput(UpdateProductInputSchema, req.body);
    res.json({ product: catalog.updateProduct(actor, productId, input) });
  });

  router.delete("/:id", (req, res) => {
    const actor = resolveActor(req);
    const product = catalog.deleteProduct(actor, parseId(req.params.id));
    if (product.image_path) {
      removeStoredImage(options.uploadDir, product.image_path);
    }
    res.json({ success: true, productId: product.product_id });
  });

  router.put("/:id/stock", (req, res) => {
    const actor = resolveActor(req);
    const productId = parseId(req.params.id);
    const input = parseInput(AdjustStockInputSchema, req.body);
    res.json(ledger.adjustStock(actor, productId, input.quantity, input.reason));
  });

  router.post("/:id/movements", (req, res) => {
    const actor = resolveActor(req);
    const productId = parseId(req.params.id);
    const input = parseInput(RegisterMovementInputSchema, req.body);
    res.status(201).json(ledger.registerMovement(actor, productId, input));
  });

  router.post(
    "/:id/image",
    requirePermission("catalog:write"),
    options.upload.single("image"),
    (req, res) => {
      const file = req.file;
      if (!file) {
        throw new ValidationError([{ path: "image", message: "an image file is required" }]);
      }

      try {
        const actor = resolveActor(req);
        const productId = parseId(req.params.id);
        const previous = catalog.setProductImage(actor, productId, file.filename);
        if (previous) {
          removeStoredImage(options.uploadDir, previous);
        }
        res.status(201).json({ product: catalog.getProduct(productId) });
      } catch (error) {
        removeStoredImage(options.uploadDir, file.filename);
        throw error;
      }
    },
  );

  return router;
}
