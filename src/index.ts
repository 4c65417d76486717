export { VariableAccessor } from './opcua/variable-accessor';
export type { VariableAccessorOptions, VariableReading, ConnectDependencies } from './opcua/variable-accessor';
export { NodeOpcuaConnection } from './opcua/connection';
export type { OpcUaConnection, ClientHandle, SessionHandle, ClientFactory, ConnectionOptions } from './opcua/connection';
export { buildEndpointUrl, toNodeId, DEFAULT_NAMESPACE_INDEX, DEFAULT_PORT } from './opcua/node-address';
export { parseAs, stringifyValue, zeroValue } from './opcua/coercion';
export type { PrimitiveType, PrimitiveTypeMap } from './opcua/coercion';
export { inferDataType, toVariant, fromVariant } from './opcua/variant';
export type { WritableValue } from './opcua/variant';
export { describeStatus, determineQuality } from './opcua/status';
export type { StatusCategory, Quality } from './opcua/status';
export { AccessorConfigSchema, parseAccessorConfig, loadConfigFromEnv } from './config';
export type { AccessorConfig, AccessorConfigInput, ConversionFailurePolicy } from './config';
export * from './errors';
export { createLogger } from './logging/logger';
export { LogComponents } from './logging/types';
export type { Logger } from './logging/types';
