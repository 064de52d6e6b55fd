export {
  ExpenseCalculator,
  type CategoryBreakdown,
  type PositionedExpense,
} from "./ExpenseCalculator";
