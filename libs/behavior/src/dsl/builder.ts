import type { AggregateLike, Behavior, Messages } from "../types";
import { compile } from "./behavior";
import { CreationBuilder } from "./creation";
import { UpdatesBuilder } from "./updates";

/**
 * Configuration steps extend the current rules and return the extended builder
 */
export type Configure<B> = (builder: B) => B;

type Stage<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> = {
  readonly name: string;
  readonly creation: CreationBuilder<A, C, E>;
  readonly updates: UpdatesBuilder<A, C, E>;
};

/** Neither creation nor update rules have been configured */
export interface BehaviorBuilder<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> extends Stage<A, C, E> {
  whenConstructing(
    configure: Configure<CreationBuilder<A, C, E>>
  ): CreationDefinedBuilder<A, C, E>;
  whenUpdating(
    configure: Configure<UpdatesBuilder<A, C, E>>
  ): UpdatesDefinedBuilder<A, C, E>;
}

/** Creation rules configured, update rules pending */
export interface CreationDefinedBuilder<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> extends Stage<A, C, E> {
  whenConstructing(
    configure: Configure<CreationBuilder<A, C, E>>
  ): CreationDefinedBuilder<A, C, E>;
  whenUpdating(
    configure: Configure<UpdatesBuilder<A, C, E>>
  ): CompletedBehaviorBuilder<A, C, E>;
}

/** Update rules configured, creation rules pending */
export interface UpdatesDefinedBuilder<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> extends Stage<A, C, E> {
  whenConstructing(
    configure: Configure<CreationBuilder<A, C, E>>
  ): CompletedBehaviorBuilder<A, C, E>;
  whenUpdating(
    configure: Configure<UpdatesBuilder<A, C, E>>
  ): UpdatesDefinedBuilder<A, C, E>;
}

/** Both rule sets configured, the only stage that can build a behavior */
export interface CompletedBehaviorBuilder<
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
> extends Stage<A, C, E> {
  whenConstructing(
    configure: Configure<CreationBuilder<A, C, E>>
  ): CompletedBehaviorBuilder<A, C, E>;
  whenUpdating(
    configure: Configure<UpdatesBuilder<A, C, E>>
  ): CompletedBehaviorBuilder<A, C, E>;
  build(): Behavior<A, C, E>;
}

const completed = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>({
  name,
  creation,
  updates
}: Stage<A, C, E>): CompletedBehaviorBuilder<A, C, E> => ({
  name,
  creation,
  updates,
  whenConstructing: (configure) =>
    completed({ name, creation: configure(creation), updates }),
  whenUpdating: (configure) =>
    completed({ name, creation, updates: configure(updates) }),
  build: () => compile(name, creation, updates)
});

const creationDefined = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>({
  name,
  creation,
  updates
}: Stage<A, C, E>): CreationDefinedBuilder<A, C, E> => ({
  name,
  creation,
  updates,
  whenConstructing: (configure) =>
    creationDefined({ name, creation: configure(creation), updates }),
  whenUpdating: (configure) =>
    completed({ name, creation, updates: configure(updates) })
});

const updatesDefined = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>({
  name,
  creation,
  updates
}: Stage<A, C, E>): UpdatesDefinedBuilder<A, C, E> => ({
  name,
  creation,
  updates,
  whenConstructing: (configure) =>
    completed({ name, creation: configure(creation), updates }),
  whenUpdating: (configure) =>
    updatesDefined({ name, creation, updates: configure(updates) })
});

/**
 * Starts declaring the behavior of an aggregate kind.
 *
 * `build()` only exists after both `whenConstructing` and `whenUpdating` were
 * called, each step can be repeated to layer more rules.
 *
 * @param name the behavior name, used in logs and errors
 * @example
 ```ts
 const ProductBehavior = behaviorFor<Product, ProductCommands, ProductEvents>("Product")
   .whenConstructing((it) =>
     it
       .on("CreateProduct", ({ data }) => ({ name: "ProductCreated", data }))
       .apply("ProductCreated", ({ data }) => ({ ...data }))
   )
   .whenUpdating((it) =>
     it
       .on(
         "ChangePrice",
         ({ data }) => data.price > 0,
         ({ data }) => ({ name: "PriceChanged", data })
       )
       .apply("PriceChanged", (product, { data }) => ({ ...product, ...data }))
   )
   .build();
 ```
 */
export const behaviorFor = <
  A extends AggregateLike,
  C extends Messages,
  E extends Messages
>(
  name = "Behavior"
): BehaviorBuilder<A, C, E> => {
  const creation = new CreationBuilder<A, C, E>();
  const updates = new UpdatesBuilder<A, C, E>();
  return {
    name,
    creation,
    updates,
    whenConstructing: (configure) =>
      creationDefined({ name, creation: configure(creation), updates }),
    whenUpdating: (configure) =>
      updatesDefined({ name, creation, updates: configure(updates) })
  };
};
