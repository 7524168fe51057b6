/**
 * Request/response contract shared by every `sale.*` gateway method.
 */

export type GatewayClientInfo = {
  id: string;
  displayName?: string;
};

export type GatewayConnection = {
  client: GatewayClientInfo;
  role?: string;
  scopes?: string[];
};

export type GatewayClient = {
  connect?: GatewayConnection;
};

export type GatewayRespond = (ok: boolean, payload: unknown) => void;

export type GatewayRequestHandlerOptions = {
  method?: string;
  params?: Record<string, unknown>;
  client?: GatewayClient;
  respond: GatewayRespond;
};

export type GatewayRequestHandler = (opts: GatewayRequestHandlerOptions) => void | Promise<void>;

export type SaleLogger = {
  debug?: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

/** Host surface handed to `register`. */
export type SalePluginApi = {
  pluginConfig?: Record<string, unknown>;
  logger: SaleLogger;
  resolveStateDir: () => string;
  registerGatewayMethod: (method: string, handler: GatewayRequestHandler) => void;
};

export type SalePluginDefinition = {
  id: string;
  name: string;
  description: string;
  version: string;
  register: (api: SalePluginApi) => void;
};
