import { subDays } from "date-fns";
import { Resource } from "../types/contracts.js";

export type GroupStats = { name: string; count: number; cost: number };

export type CostBand = "0-10k" | "10k-50k" | "50k-100k" | "100k+";

export const RECENT_DAYS = 30;

export interface InventoryStats {
  totalResources: number;
  totalCost: number;
  averageCost: number;
  medianCost: number;
  departments: GroupStats[]; // by cost, highest first
  locations: GroupStats[]; // by cost, highest first
  costBands: Record<CostBand, number>;
  recentAdditions: number; // created within RECENT_DAYS
  mostExpensive?: Resource;
  leastExpensive?: Resource;
  oldest?: Resource; // by created_at
  newest?: Resource;
}

/** Upper bounds are inclusive: exactly ₹10,000 is in "0-10k". */
export function costBand(cost: number): CostBand {
  if (cost <= 10_000) return "0-10k";
  if (cost <= 50_000) return "10k-50k";
  if (cost <= 100_000) return "50k-100k";
  return "100k+";
}

function groupBy(resources: Resource[], key: "department" | "location"): GroupStats[] {
  const acc = new Map<string, GroupStats>();
  for (const r of resources) {
    const name = r[key] || "Unknown";
    const g = acc.get(name) ?? { name, count: 0, cost: 0 };
    g.count += 1;
    g.cost += r.cost;
    acc.set(name, g);
  }
  return [...acc.values()].sort((a, b) => b.cost - a.cost || a.name.localeCompare(b.name));
}

// upper median for even counts
function median(costs: number[]): number {
  if (costs.length === 0) return 0;
  const sorted = [...costs].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

export function computeInventoryStats(resources: Resource[], now: Date = new Date()): InventoryStats {
  const costBands: Record<CostBand, number> = { "0-10k": 0, "10k-50k": 0, "50k-100k": 0, "100k+": 0 };
  const since = subDays(now, RECENT_DAYS).toISOString();
  let mostExpensive: Resource | undefined;
  let leastExpensive: Resource | undefined;
  let oldest: Resource | undefined;
  let newest: Resource | undefined;
  let totalCost = 0;
  let recentAdditions = 0;

  for (const r of resources) {
    totalCost += r.cost;
    costBands[costBand(r.cost)] += 1;
    if (!mostExpensive || r.cost > mostExpensive.cost) mostExpensive = r;
    if (!leastExpensive || r.cost < leastExpensive.cost) leastExpensive = r;
    if (!oldest || r.created_at < oldest.created_at) oldest = r;
    if (!newest || r.created_at > newest.created_at) newest = r;
    if (r.created_at >= since) recentAdditions += 1;
  }

  return {
    totalResources: resources.length,
    totalCost,
    averageCost: resources.length ? totalCost / resources.length : 0,
    medianCost: median(resources.map((r) => r.cost)),
    departments: groupBy(resources, "department"),
    locations: groupBy(resources, "location"),
    costBands,
    recentAdditions,
    mostExpensive,
    leastExpensive,
    oldest,
    newest
  };
}
