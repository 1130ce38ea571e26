/**
 * Token Exchange Flows
 */

export { AuthExchange } from "./auth-exchange";
