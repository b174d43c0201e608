import { describe, expectTypeOf, it } from "vitest";
import type {
  CommandCallback,
  CommandDispatchTarget,
  CommandFailureMessage,
  CommandMessage,
  CommandResultMessage,
  CommandSuccessMessage,
  MetaData,
} from "@cmdtrace/types";

describe("command contracts", () => {
  it("narrows results on the exceptional flag", () => {
    const inspect = (result: CommandResultMessage<number>) => {
      if (result.exceptional) {
        expectTypeOf(result).toEqualTypeOf<CommandFailureMessage>();
        return;
      }

      expectTypeOf(result).toEqualTypeOf<CommandSuccessMessage<number>>();
      expectTypeOf(result.payload).toEqualTypeOf<number>();
    };

    expectTypeOf(inspect).parameter(0).toEqualTypeOf<CommandResultMessage<number>>();
  });

  it("keeps metadata read-only string pairs", () => {
    expectTypeOf<MetaData>().toEqualTypeOf<Readonly<Record<string, string>>>();
    expectTypeOf<CommandMessage<{ id: string }>["metadata"]>().toEqualTypeOf<MetaData>();
  });

  it("passes the command payload type through callbacks", () => {
    type Callback = CommandCallback<{ id: string }, boolean>;

    expectTypeOf<Callback>().parameter(0).toEqualTypeOf<CommandMessage<{ id: string }>>();
    expectTypeOf<Callback>().parameter(1).toEqualTypeOf<CommandResultMessage<boolean>>();
  });

  it("lets dispatch targets accept an abort signal", () => {
    expectTypeOf<CommandDispatchTarget["dispatch"]>().parameter(2).toEqualTypeOf<
      { signal?: AbortSignal } | undefined
    >();
  });
});
