export const COLORS = {
  lines: {
    chw: "#1f77b4",       // blue
    mthw: "#ff7f0e",      // orange
    threshold: "#d62728", // red
  },
  markers: {
    simultaneous: "#d62728",
  },
} as const;
