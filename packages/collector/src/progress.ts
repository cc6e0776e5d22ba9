import type { ProgressReporter } from "@sampler/types";

export const noopProgress: ProgressReporter = {
  start: () => undefined,
  tick: () => undefined,
  finish: () => undefined,
};
