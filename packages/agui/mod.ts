/**
 * AG-UI protocol: event encoder, run input parsing and the Hono routes that
 * serve them.
 *
 * @module
 */

export { AguiEncoder, createRunErrorEvent } from "./encoder.ts";
export type { AguiEncoderOptions } from "./encoder.ts";

export { parseRunAgentRequest, RunAgentRequest } from "./request.ts";

export { createAguiRouter } from "./router.ts";
export type { AguiRouterOptions } from "./router.ts";
