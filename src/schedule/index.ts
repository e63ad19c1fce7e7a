export {
  inWindow,
  nearestExpected,
  nextExpected,
  previousExpected,
  resolveExpectedAt,
  validateSchedule,
  type WindowPosition,
} from "./evaluator";
