import type { RegistrySnapshot, RegistryStats } from "../types/environment.js";

export function computeStats(snapshot: RegistrySnapshot): RegistryStats {
  const categories: Record<string, number> = {};
  let running = 0;
  let withExploit = 0;
  let withImages = 0;

  for (const rec of snapshot) {
    categories[rec.category] = (categories[rec.category] ?? 0) + 1;
    if (rec.status === "running") running++;
    if (rec.hasExploitArtifacts) withExploit++;
    if (rec.hasAllImagesLocally) withImages++;
  }

  return { total: snapshot.length, running, withExploit, withImages, categories };
}
