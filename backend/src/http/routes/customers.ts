import { Router } from "express";
import { resolveActor } from "../actor.js";
import type { Services } from "../services.js";
import {
  CreateCustomerInputSchema,
  CustomerListQuerySchema,
  UpdateCustomerInputSchema,
} from "../../models/customer.js";
import { parseId, parseInput } from "../../models/validation.js";
import { pageBody, pageRequest } from "./pagination.js";

export function customerRouter(services: Services, pageSize: number): Router {
  const router: Router = Router();
  const { customers } = services;

  router.get("/", (req, res) => {
    resolveActor(req);
    const query = parseInput(CustomerListQuerySchema, req.query);
    const page = customers.listCustomers(pageRequest(query.page, query.page_size, pageSize));
    res.json(pageBody("customers", page));
  });

  router.get("/:id", (req, res) => {
    resolveActor(req);
    res.json({ customer: customers.getCustomer(parseId(req.params.id)) });
  });

  router.post("/", (req, res) => {
    const actor = resolveActor(req);
    const input = parseInput(CreateCustomerInputSchema, req.body);
    res.status(201).json({ customer: customers.createCustomer(actor, input) });
  });

  router.patch("/:id", (req, res) => {
    const actor = resolveActor(req);
    const customerId = parseId(req.params.id);
    const input = parseInput(UpdateCustomerInputSchema, req.body);
    res.json({ customer: customers.updateCustomer(actor, customerId, input) });
  });

  router.delete("/:id", (req, res) => {
    const actor = resolveActor(req);
    const customer = customers.deleteCustomer(actor, parseId(req.params.id));
    res.json({ success: true, customerId: customer.customer_id });
  });

  return router;
}
