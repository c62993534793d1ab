// packages/results/__tests__/_helpers/creek-container.ts
// In-memory result container for the Mill Creek fixtures (plan p01).
import { MemoryContainer, type MemoryGroup } from "../../src/container.js";

export const STEADY_PROFILES = "Results/Steady/Output/Output Blocks/Base Output/Steady Profiles";

export function creekTree(version = "HEC-RAS 6.3.1 September 2022"): MemoryGroup {
  return {
    attributes: { "File Type": "HEC-RAS Results", "File Version": version },
    children: {
      "Plan Data": {
        children: {
          "Plan Information": {
            attributes: { "Plan Name": "Existing Conditions", "Plan ShortID": "Existing", "Flow Filename": "Creek.f01" },
            children: {},
          },
        },
      },
      Geometry: {
        children: {
          "Cross Sections": {
            children: {
              "River Names": { shape: [3], values: ["Mill Creek  ", "Mill Creek", "Mill Creek"] },
              "Reach Names": { shape: [3], values: ["Upper", "Upper", "Upper"] },
              "River Stations": { shape: [3], values: ["5280.0", "5000", "4800"] },
              "Bank Stations": { shape: [3, 2], values: [52, 150, 40, 120, 10, 90] },
              Lengths: { shape: [3, 3], values: [500, 520, 510, 200, 200, 200, 0, 0, 0] },
            },
          },
          "2D Flow Areas": { children: {} },
        },
      },
      Results: {
        children: {
          Steady: {
            children: {
              Output: {
                children: {
                  "Output Blocks": {
                    children: {
                      "Base Output": {
                        children: {
                          "Steady Profiles": {
                            children: {
                              "Profile Names": { shape: [3], values: ["10yr", "100yr", "500yr"] },
                              "Cross Sections": {
                                children: {
                                  "Water Surface": {
                                    attributes: { Units: "ft" },
                                    shape: [3, 3],
                                    values: [96.1, 91.2, 90.0, 97.5, 92.8, 91.4, 98.2, 93.5, 92.0],
                                  },
                                  Flow: {
                                    shape: [3, 3],
                                    values: [1200, 1200, 1200, 2500, 2500, 2500, 3400, 3400, 3400],
                                  },
                                },
                              },
                            },
                          },
                        },
                      },
                    },
                  },
                },
              },
            },
          },
          Unsteady: { children: { Summary: { shape: [1], values: [0] } } },
        },
      },
    },
  };
}

export function creekContainer(version?: string): MemoryContainer {
  return new MemoryContainer("Creek.p01.hdf", creekTree(version));
}
