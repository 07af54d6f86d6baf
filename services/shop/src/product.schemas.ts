import { z } from "zod";

export const Product = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    price: z.number().positive()
  })
  .describe("A product in the catalog");

export const CreateProduct = Product.describe(
  "Adds a product to the catalog"
);

export const ChangePrice = z
  .object({
    price: z.number()
  })
  .describe("Changes the price of a product, must be positive");

export const ProductCreated = Product.describe(
  "Generated when a product is added to the catalog"
);

export const PriceChanged = z
  .object({
    price: z.number().positive()
  })
  .describe("Generated when the price of a product changes");

export type Product = z.infer<typeof Product>;

export type ProductCommands = {
  CreateProduct: z.infer<typeof CreateProduct>;
  ChangePrice: z.infer<typeof ChangePrice>;
};

export type ProductEvents = {
  ProductCreated: z.infer<typeof ProductCreated>;
  PriceChanged: z.infer<typeof PriceChanged>;
};
