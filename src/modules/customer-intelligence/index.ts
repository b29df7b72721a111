import { Module } from "@medusajs/framework/utils";
import CustomerIntelligenceModuleService from "./service";

export const CUSTOMER_INTELLIGENCE_MODULE = "customer-intelligence";

export default Module(CUSTOMER_INTELLIGENCE_MODULE, {
  service: CustomerIntelligenceModuleService
});
