export { GuardParser, parseGuards } from "./GuardParser"
export { buildStockView, type StockView } from "./stock-view"
export {
	commentOutLine,
	containsTag,
	createGuardClassifier,
	renderGuarded,
	uncommentLine,
	type GuardLine,
	type GuardShape,
} from "./guard-syntax"
