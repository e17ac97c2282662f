import type Database from "better-sqlite3";
import { authorize, type Actor } from "../auth/actor.js";
import {
  countCustomers,
  countSalesForCustomer,
  deleteCustomerRow,
  findCustomer,
  insertCustomer,
  listCustomers,
  updateCustomerFields,
} from "../database/customers.js";
import { withTransaction } from "../database/transaction.js";
import { CustomerHasSalesError, UnknownCustomerError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import {
  customerDisplayName,
  type CreateCustomerInput,
  type Customer,
  type UpdateCustomerInput,
} from "../models/customer.js";
import { buildPage, pageOffset, type Page, type PageRequest } from "../utils/pagination.js";

const log = moduleLogger("customers");

export interface CustomerDirectoryOptions {
  now?: () => Date;
}

export class CustomerDirectory {
  private readonly now: () => Date;

  constructor(
    private readonly db: Database.Database,
    options: CustomerDirectoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  createCustomer(actor: Actor, input: CreateCustomerInput): Customer {
    authorize(actor, "customers:write");

    const customerId = insertCustomer(this.db, {
      first_name: input.first_name,
      last_name: input.last_name,
      email: input.email ?? null,
      phone: input.phone ?? null,
      address: input.address ?? null,
      created_at: this.now().toISOString(),
    });
    const customer = this.getCustomer(customerId);

    log.info(
      { customerId, name: customerDisplayName(customer), actor: actor.username },
      "Customer created",
    );
    return customer;
  }

  updateCustomer(actor: Actor, customerId: number, input: UpdateCustomerInput): Customer {
    authorize(actor, "customers:write");

    if (!updateCustomerFields(this.db, customerId, input)) {
      throw new UnknownCustomerError(customerId);
    }

    log.info({ customerId, fields: Object.keys(input), actor: actor.username }, "Customer updated");
    return this.getCustomer(customerId);
  }

  /** Customers with recorded sales are kept; their sales reference them. */
  deleteCustomer(actor: Actor, customerId: number): Customer {
    authorize(actor, "customers:write");

    const customer = withTransaction(this.db, "deleteCustomer", () => {
      const existing = this.getCustomer(customerId);
      if (countSalesForCustomer(this.db, customerId) > 0) {
        throw new CustomerHasSalesError(customerId);
      }
      deleteCustomerRow(this.db, customerId);
      return existing;
    });

    log.info({ customerId, actor: actor.username }, "Customer deleted");
    return customer;
  }

  getCustomer(customerId: number): Customer {
    const customer = findCustomer(this.db, customerId);
    if (!customer) {
      throw new UnknownCustomerError(customerId);
    }
    return customer;
  }

  listCustomers(request: PageRequest): Page<Customer> {
    return buildPage(
      listCustomers(this.db, request.pageSize, pageOffset(request)),
      countCustomers(this.db),
      request,
    );
  }
}
