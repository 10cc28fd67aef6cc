// backend/services/gp/src/routes/routeTable.ts
/**
 * Purpose:
 * - The fixed set of named routes this service exposes. Paths are an
 *   external contract; handlers are mounted by name in app.ts.
 *
 * Invariants:
 * - Built once at startup, frozen afterwards.
 * - Names and paths are unique; a collision aborts startup.
 * - Lookups are exact and case-sensitive (`/gp/EI` is not `/gp/ei`).
 */

import { StartupError } from "../../../shared/src/errors/StartupError";

export type RouteEntry<N extends string = string> = Readonly<{
  name: N;
  path: string;
}>;

export const GP_ROUTES = [
  { name: "home", path: "/" },
  { name: "docs", path: "/docs" },
  { name: "about", path: "/about" },
  { name: "gp_ei", path: "/gp/ei" },
  { name: "gp_ei_pretty", path: "/gp/ei/pretty" },
  { name: "gp_mean_var", path: "/gp/mean_var" },
  { name: "gp_mean_var_pretty", path: "/gp/mean_var/pretty" },
  { name: "gp_next_points_epi", path: "/gp/next_points/epi" },
  { name: "gp_next_points_epi_pretty", path: "/gp/next_points/epi/pretty" },
] as const satisfies readonly RouteEntry[];

export type GpRouteName = (typeof GP_ROUTES)[number]["name"];

export class RouteTable<N extends string = string> {
  public readonly entries: readonly RouteEntry<N>[];
  private readonly byName = new Map<string, RouteEntry<N>>();
  private readonly byPath = new Map<string, RouteEntry<N>>();

  constructor(entries: readonly RouteEntry<N>[]) {
    for (const entry of entries) {
      const sameName = this.byName.get(entry.name);
      if (sameName) {
        throw new StartupError(
          "ROUTE_CONFLICT",
          `route name "${entry.name}" registered twice (${sameName.path}, ${entry.path})`
        );
      }
      const samePath = this.byPath.get(entry.path);
      if (samePath) {
        throw new StartupError(
          "ROUTE_CONFLICT",
          `path "${entry.path}" registered for both "${samePath.name}" and "${entry.name}"`
        );
      }
      const frozen = Object.freeze({ name: entry.name, path: entry.path });
      this.byName.set(entry.name, frozen);
      this.byPath.set(entry.path, frozen);
    }
    this.entries = Object.freeze([...this.byName.values()]);
  }

  public has(name: string): name is N {
    return this.byName.has(name);
  }

  public get(name: string): RouteEntry<N> | undefined {
    return this.byName.get(name);
  }

  public pathFor(name: N): string {
    const entry = this.byName.get(name);
    if (!entry) throw new Error(`Unknown route: ${name}`);
    return entry.path;
  }

  /** Exact, case-sensitive path lookup. */
  public match(path: string): RouteEntry<N> | undefined {
    return this.byPath.get(path);
  }
}

export function createRouteTable(): RouteTable<GpRouteName> {
  return new RouteTable<GpRouteName>(GP_ROUTES);
}
