// src/core/capacity/index.ts

export { capacity, countEligibleSamples, ensureFits, rawCapacity } from './capacityPlanner';
