import { Router } from "express";
import { resolveActor } from "../actor.js";
import type { Services } from "../services.js";
import {
  DEFAULT_STATISTICS_DAYS,
  RecordSaleInputSchema,
  SaleListQuerySchema,
  SaleStatisticsQuerySchema,
} from "../../models/sale.js";
import { parseId, parseInput } from "../../models/validation.js";
import type { StatisticsWindow } from "../../reports/sales-reports.js";
import { pageBody, pageRequest } from "./pagination.js";

export function saleRouter(services: Services, pageSize: number): Router {
  const router: Router = Router();
  const { ledger, reports, now } = services;

  router.get("/", (req, res) => {
    resolveActor(req);
    const query = parseInput(SaleListQuerySchema, req.query);
    const page = reports.listSales(
      { from: query.from, to: query.to },
      pageRequest(query.page, query.page_size, pageSize),
    );
    res.json(pageBody("sales", page));
  });

  router.get("/statistics", (req, res) => {
    resolveActor(req);
    const query = parseInput(SaleStatisticsQuerySchema, req.query);
    const window: StatisticsWindow =
      query.from !== undefined || query.to !== undefined
        ? { from: query.from, to: query.to }
        : { days: query.days ?? DEFAULT_STATISTICS_DAYS };
    res.json(reports.statistics(window, now()));
  });

  router.get("/:id", (req, res) => {
    resolveActor(req);
    res.json({ sale: reports.getSale(parseId(req.params.id)) });
  });

  router.post("/", (req, res) => {
    const actor = resolveActor(req);
    const input = parseInput(RecordSaleInputSchema, req.body);
    res.status(201).json({ sale: ledger.recordSale(actor, input) });
  });

  router.delete("/:id", (req, res) => {
    const actor = resolveActor(req);
    const sale = ledger.deleteSale(actor, parseId(req.params.id));
    res.json({ success: true, saleId: sale.sale_id, code: sale.code });
  });

  return router;
}
