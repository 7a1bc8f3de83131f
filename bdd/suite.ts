import {
  Err,
  Ok,
  type Operation,
  type Result,
  run,
  type Scope,
  suspend,
  type Task,
  useScope,
  withResolvers,
} from "effection";

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export type TestOperation = () => Operation<void>;

/**
 * One `describe()` block. Its `beforeAll()` operations run once, inside a
 * scope that stays alive until the block finishes, so resources they
 * create are shared by every test in the block. `beforeEach()` operations
 * run again for every test, together with those of every ancestor.
 */
export interface Suite {
  readonly name: string;
  readonly parent?: Suite;

  /**
   * This suite and every suite it is nested in, outermost first.
   */
  readonly lineage: Suite[];

  readonly setup: { all: TestOperation[]; each: TestOperation[] };

  addOnetimeSetup(op: TestOperation): void;
  addSetup(op: TestOperation): void;

  runTest(body: TestOperation): Promise<Result<void>>;

  /**
   * Halt the suite scope along with every resource `beforeAll()` created.
   */
  destroy(): Promise<void>;

  /**
   * @ignore
   */
  open(): Operation<Scope>;
}

export function createSuite(name: string, parent?: Suite): Suite {
  const setup = {
    all: [] as TestOperation[],
    each: [] as TestOperation[],
  };

  let opened: ReturnType<typeof withResolvers<Scope>> | undefined;
  let task: Task<void> | undefined;

  function* body(): Operation<void> {
    try {
      let scope = yield* useScope();
      for (let op of setup.all) {
        yield* op();
      }
      opened?.resolve(scope);
    } catch (error) {
      opened?.reject(toError(error));
      return;
    }
    yield* suspend();
  }

  const suite: Suite = {
    name,
    parent,
    setup,
    get lineage() {
      return parent ? [...parent.lineage, suite] : [suite];
    },
    addOnetimeSetup(op) {
      setup.all.push(op);
    },
    addSetup(op) {
      setup.each.push(op);
    },
    *open() {
      if (!opened) {
        opened = withResolvers<Scope>();
        if (parent) {
          let outer = yield* parent.open();
          task = outer.run(body);
        } else {
          task = run(body);
        }
      }
      return yield* opened.operation;
    },
    async runTest(test) {
      return await run(function* () {
        try {
          yield* suite.open();
          for (let each of suite.lineage.flatMap((s) => s.setup.each)) {
            yield* each();
          }
          yield* test();
          return Ok(undefined);
        } catch (error) {
          return Err(toError(error));
        }
      });
    },
    async destroy() {
      if (task) {
        await task.halt();
      }
    },
  };

  return suite;
}
