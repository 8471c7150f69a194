export type {
  RecordWireBody,
  RemoteCreateOptions,
  RemoteCreateResult,
  RemoteService,
} from "./types"
export type { WebRemoteOptions } from "./web"
export { createWebRemote, toWireBody } from "./web"
