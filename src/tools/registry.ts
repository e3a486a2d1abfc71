import { FatalConfiguration } from "../errors.js";
import { isToolName, type RegisteredTool, type ToolName } from "./types.js";

export type ToolListing = { name: ToolName; description: string };

/** Built and validated once at startup; frozen afterwards. */
export class ToolRegistry {
  private readonly byName: ReadonlyMap<string, RegisteredTool>;
  readonly names: ReadonlySet<string>;

  constructor(tools: readonly RegisteredTool[]) {
    const map = new Map<string, RegisteredTool>();
    for (const tool of tools) {
      if (!isToolName(tool.name)) throw new FatalConfiguration(`Tool ${tool.name} is not in the closed tool set`);
      if (map.has(tool.name)) throw new FatalConfiguration(`Tool ${tool.name} registered twice`);
      map.set(tool.name, tool);
    }
    this.byName = map;
    this.names = new Set(map.keys());
    Object.freeze(this);
  }

  get(name: string): RegisteredTool | undefined {
    return this.byName.get(name);
  }

  list(): ToolListing[] {
    return [...this.byName.values()].map((t) => ({ name: t.name, description: t.description }));
  }
}
