export { ElementaryAutomataRule, type ElementaryPattern } from "./elementary";
export { IndivAutomataRule, LifeLikeAutomataRule, LifeLikeTable } from "./life-like";
export { NeighbourCountAutomataRule } from "./neighbour-count";
export * from "./neighbourhood";
export * from "./reseeder";
