import type { PonyFactorResult } from "@ponyfactor/core";

export type PonyFactorOutputMode = "text" | "json";

const formatText = (result: PonyFactorResult): string => {
  if (!result.available) {
    return (
      `Pony factor is undefined: contributors active since ${result.metrics.recencyCutoff} ` +
      `reach only ${result.coveragePercent}% of the ${result.metrics.thresholdCommitCount}-commit threshold`
    );
  }

  const rows = result.contributors.map(
    (contributor) => `${contributor.name}\t${contributor.commitCount}\t${contributor.lastCommitDate}`,
  );
  return [...rows, "", `Pony Factor = ${result.ponyFactor}`].join("\n");
};

export const formatPonyFactorOutput = (result: PonyFactorResult, mode: PonyFactorOutputMode): string =>
  mode === "json" ? JSON.stringify(result, null, 2) : formatText(result);
