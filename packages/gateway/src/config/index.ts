export {
  type LoadGatewayConfigOptions,
  loadGatewayConfig,
  mapEnvToConfig,
} from "./load-gateway-config"
export {
  type EnvConfig,
  envSchema,
  type GatewayConfig,
  type StorageDriver,
  storageDrivers,
} from "./schema"
