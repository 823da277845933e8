export {
  WsConnection,
  defaultConnectionFactory,
  type IWsConnection,
  type WsConnectionFactory,
  type WsConnectionOptions,
} from "./ws-connection";
