export { OrderSimulator } from "./orderSimulator";
export { PortfolioLedger } from "./portfolioLedger";
