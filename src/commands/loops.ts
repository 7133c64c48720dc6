import { renderLoopsList } from "../lib/render";
import { type CommandContext, printLines } from "./context";

export async function handleLoops(ctx: CommandContext): Promise<void> {
  printLines(ctx, renderLoopsList(ctx.catalog));
}
