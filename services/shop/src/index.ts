import { manager } from "@aggregate-kit/behavior";
import { ProductBehavior } from "./product.behavior";

export * from "./product.behavior";
export * from "./product.schemas";

export const products = manager("Product", ProductBehavior);
