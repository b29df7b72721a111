import {
  ContainerRegistrationKeys,
  MedusaService
} from "@medusajs/framework/utils";
import type { Logger } from "@medusajs/framework/types";
import type { Knex } from "knex";
import {
  resolveOptions,
  type CustomerIntelligenceOptions,
  type CustomerIntelligenceOptionsInput,
  type SegmentDefinition
} from "./config";
import {
  createCustomerIntelligence,
  type CustomerIntelligence
} from "./lib/dashboard";
import type {
  AffinityPair,
  CohortRetention,
  CustomerDashboard,
  CustomerDetail,
  CustomerSearchResult,
  SegmentSummaryRow
} from "./lib/types";
import { KnexCustomerOrderRepository } from "./repositories/customer-order-repository";

class CustomerIntelligenceModuleService extends MedusaService({}) {
  private readonly options: CustomerIntelligenceOptions;

  constructor(
    container: Record<string, unknown>,
    options: CustomerIntelligenceOptionsInput = {}
  ) {
    super(container, options);
    this.options = resolveOptions(options);
  }

  private get db(): Knex {
    return this.__container__[ContainerRegistrationKeys.PG_CONNECTION] as Knex;
  }

  private get logger(): Logger {
    return this.__container__[ContainerRegistrationKeys.LOGGER] as Logger;
  }

  // Built per call so each request reads a fresh snapshot.
  private get engine(): CustomerIntelligence {
    return createCustomerIntelligence({
      repository: new KnexCustomerOrderRepository(this.db),
      logger: this.logger,
      options: this.options
    });
  }

  get reportingCurrency(): string {
    return this.options.reportingCurrency;
  }

  get segments(): SegmentDefinition[] {
    return this.options.segments;
  }

  get configuration(): CustomerIntelligenceOptions {
    return {
      ...this.options,
      segments: this.options.segments.map((segment) => ({
        ...segment,
        all: segment.all?.map((condition) => ({ ...condition })),
        none: segment.none?.map((condition) => ({ ...condition }))
      }))
    };
  }

  async buildDashboard(): Promise<CustomerDashboard> {
    return this.engine.buildDashboard();
  }

  async getRfmSegments(): Promise<SegmentSummaryRow[]> {
    return this.engine.getRfmSegments();
  }

  async getCohortRetention(): Promise<CohortRetention> {
    return this.engine.getCohortRetention();
  }

  async getBrandAffinity(): Promise<AffinityPair[]> {
    return this.engine.getBrandAffinity();
  }

  async getCustomerDetail(email: string): Promise<CustomerDetail | null> {
    return this.engine.getCustomerDetail(email);
  }

  async searchCustomers(
    term: string,
    limit?: number
  ): Promise<CustomerSearchResult[]> {
    return this.engine.searchCustomers(term, limit);
  }
}

export default CustomerIntelligenceModuleService;
