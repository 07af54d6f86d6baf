import {
  behaviorFor,
  ConfigurationError,
  CreationBuilder,
  dispose,
  Errors,
  reject,
  UnhandledEventError,
  UpdatesBuilder
} from "..";
import {
  AccountRules,
  newAccount,
  type Account,
  type AccountCommands,
  type AccountEvents
} from "./account";

type HasBuild<T> = "build" extends keyof T ? true : false;

const start = () =>
  behaviorFor<Account, AccountCommands, AccountEvents>("Account");

describe("Builder", () => {
  afterAll(async () => {
    await dispose()();
  });

  describe("stages", () => {
    it("should not build without update rules", () => {
      const creationOnly = start().whenConstructing(() => AccountRules.creation);
      const canBuild: HasBuild<typeof creationOnly> = false;
      expect(canBuild).toBe(false);
      expect("build" in creationOnly).toBe(false);
    });

    it("should not build without creation rules", () => {
      const updatesOnly = start().whenUpdating(() => AccountRules.updates);
      const canBuild: HasBuild<typeof updatesOnly> = false;
      expect(canBuild).toBe(false);
      expect("build" in updatesOnly).toBe(false);
    });

    it("should build when both steps were configured, in any order", () => {
      const completed = start()
        .whenUpdating(() => AccountRules.updates)
        .whenConstructing(() => AccountRules.creation);
      const canBuild: HasBuild<typeof completed> = true;
      expect(canBuild).toBe(true);
      expect(typeof completed.build).toBe("function");
      expect(completed.build().name).toBe("Account");
    });

    it("should fail fast when a step configured no command rules", () => {
      expect(() =>
        start()
          .whenConstructing((it) => it)
          .whenUpdating(() => AccountRules.updates)
          .build()
      ).toThrow(ConfigurationError);
      expect(() =>
        start()
          .whenConstructing(() => AccountRules.creation)
          .whenUpdating((it) => it)
          .build()
      ).toThrow(
        'Behavior "Account" is not fully configured: missing update command rules'
      );
    });

    it("should fail fast without creation folds", () => {
      expect(() =>
        start()
          .whenConstructing((it) =>
            it.on("OpenAccount", ({ data }) => ({
              name: "AccountOpened",
              data
            }))
          )
          .whenUpdating(() => AccountRules.updates)
          .build()
      ).toThrow(
        'Behavior "Account" is not fully configured: missing creation event rules'
      );
    });

    it("should freeze built behaviors", () => {
      expect(Object.isFrozen(AccountRules.build())).toBe(true);
    });
  });

  describe("rules", () => {
    it("should return new builders on every registration", () => {
      const base = new CreationBuilder<Account, AccountCommands, AccountEvents>();
      const one = base.on("OpenAccount", ({ data }) => ({
        name: "AccountOpened",
        data
      }));
      const two = one.apply("AccountOpened", ({ data }) =>
        newAccount(data.id, data.owner)
      );
      expect(base.commands).toHaveLength(0);
      expect(base.events).toHaveLength(0);
      expect(one.commands).toHaveLength(1);
      expect(one.events).toHaveLength(0);
      expect(two.commands).toHaveLength(1);
      expect(two.events).toHaveLength(1);
    });

    it("should layer rules on repeated steps", () => {
      const layered = AccountRules.whenUpdating((it) =>
        it.on("Deposit", ({ data }) => ({ name: "Deposited", data }))
      ).whenUpdating((it) =>
        it.apply("Audited", (account) => account)
      );
      expect(AccountRules.updates.commands).toHaveLength(3);
      expect(AccountRules.updates.events).toHaveLength(2);
      expect(layered.updates.commands).toHaveLength(4);
      expect(layered.updates.events).toHaveLength(3);
    });

    it("should branch shared builders", async () => {
      const shared = new UpdatesBuilder<
        Account,
        AccountCommands,
        AccountEvents
      >().apply("Deposited", (account, { data }) => ({
        ...account,
        balance: account.balance + data.amount
      }));
      const strict = shared.on(
        "Deposit",
        ({ data }) => data.amount <= 100,
        ({ data }) => ({ name: "Deposited", data })
      );
      const lenient = shared.on("Deposit", ({ data }) => ({
        name: "Deposited",
        data
      }));

      const Strict = start()
        .whenConstructing(() => AccountRules.creation)
        .whenUpdating(() => strict)
        .build();
      const Lenient = start()
        .whenConstructing(() => AccountRules.creation)
        .whenUpdating(() => lenient)
        .build();

      const deposit = { name: "Deposit", data: { amount: 500 } } as const;
      const strictResult = await Strict.validateUpdate(deposit, newAccount("a-1"));
      const lenientResult = await Lenient.validateUpdate(
        deposit,
        newAccount("a-1")
      );
      expect(strictResult.status).toBe("rejected");
      expect(lenientResult.status).toBe("accepted");
      expect(shared.commands).toHaveLength(0);
    });

    it("should match creation commands and events with predicates", async () => {
      const Migrated = start()
        .whenConstructing((it) =>
          it
            .when(
              ({ name }) => name === "OpenAccount",
              (command) =>
                command.name === "OpenAccount"
                  ? { name: "AccountOpened", data: command.data }
                  : reject("Not an opening command")
            )
            .applyWhen(
              ({ name }) => name === "AccountOpened",
              (event) =>
                event.name === "AccountOpened"
                  ? newAccount(event.data.id, event.data.owner, 100)
                  : newAccount("none")
            )
        )
        .whenUpdating(() => AccountRules.updates)
        .build();

      expect(
        await Migrated.validateCreation({
          name: "OpenAccount",
          data: { id: "a-1", owner: "Alice" }
        })
      ).toEqual({
        status: "accepted",
        value: { name: "AccountOpened", data: { id: "a-1", owner: "Alice" } }
      });
      const unmatched = await Migrated.validateCreation({
        name: "Deposit",
        data: { amount: 5 }
      });
      expect(unmatched.status === "rejected" && unmatched.rejection.code).toBe(
        Errors.InvalidCreationCommand
      );

      expect(
        Migrated.applyCreation({
          name: "AccountOpened",
          data: { id: "a-1", owner: "Alice" }
        })
      ).toEqual({ id: "a-1", owner: "Alice", balance: 100 });
      const deposited = { name: "Deposited", data: { amount: 5 } } as const;
      expect(Migrated.isCreationEventDefined(deposited)).toBe(false);
      expect(() => Migrated.applyCreation(deposited)).toThrow(
        UnhandledEventError
      );
    });

    it("should match commands and events with predicates", async () => {
      const Audited = start()
        .whenConstructing(() => AccountRules.creation)
        .whenUpdating((it) =>
          it
            .when(
              (command) =>
                command.name === "Deposit" && command.data.amount > 1000,
              (command, account) => [
                { name: "Audited", data: { by: "compliance" } },
                {
                  name: "Deposited",
                  data: {
                    amount:
                      command.name === "Deposit" ? command.data.amount : 0
                  }
                },
                { name: "Audited", data: { by: account.owner } }
              ]
            )
            .applyWhen(
              (_, event) => event.name === "Deposited",
              (account, event) => ({
                ...account,
                balance:
                  account.balance +
                  (event.name === "Deposited" ? event.data.amount : 0)
              })
            )
        )
        .build();

      const account = newAccount("a-1", "Alice", 0);
      const validation = await Audited.validateUpdate(
        { name: "Deposit", data: { amount: 2000 } },
        account
      );
      expect(validation).toEqual({
        status: "accepted",
        value: [
          { name: "Audited", data: { by: "compliance" } },
          { name: "Deposited", data: { amount: 2000 } },
          { name: "Audited", data: { by: "Alice" } }
        ]
      });
      const small = await Audited.validateUpdate(
        { name: "Deposit", data: { amount: 10 } },
        account
      );
      expect(small.status).toBe("rejected");

      const folded =
        validation.status === "accepted"
          ? validation.value.reduce(Audited.applyUpdate, account)
          : account;
      expect(folded).toEqual({ id: "a-1", owner: "Alice", balance: 2000 });
    });
  });
});
