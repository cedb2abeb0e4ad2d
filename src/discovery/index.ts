export {
  buildDiscoveryMessage,
  buildDiscoveryMessages,
  buildStatePayload,
  classesForUnit,
  deviceTopic,
  resolveModel,
  stateTopic,
} from './discovery';
export type { DeviceClass, DiscoveryOptions, DiscoveryPayload, MqttMessage, StateClass } from './discovery';
export { SENSORS } from './sensors';
export type { SensorDefinition, SensorKey } from './sensors';
