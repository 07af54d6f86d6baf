import { behaviorFor, reject, validate } from "@aggregate-kit/behavior";
import * as schemas from "./product.schemas";

export const ProductBehavior = behaviorFor<
  schemas.Product,
  schemas.ProductCommands,
  schemas.ProductEvents
>("Product")
  .whenConstructing((it) =>
    it
      .on("CreateProduct", ({ data }) => () => ({
        name: "ProductCreated",
        data: validate(data, schemas.CreateProduct)
      }))
      .apply("ProductCreated", ({ data }) => ({
        id: data.id,
        name: data.name,
        price: data.price
      }))
  )
  .whenUpdating((it) =>
    it
      .on(
        "ChangePrice",
        ({ data }) => data.price > 0,
        ({ data }) => ({ name: "PriceChanged", data: { price: data.price } })
      )
      .on("ChangePrice", ({ data }, product) =>
        reject(`Price of ${product.id} must be positive`, {
          price: data.price
        })
      )
      .apply("PriceChanged", (product, { data }) => ({
        ...product,
        price: data.price
      }))
  )
  .build();
