export { AzureSpringCloudManager, createSpringCloudManager } from "./manager.js";
export { SpringCloudApp, SpringCloudAppBuilder } from "./app.js";
export { SpringCloudDeployment, SpringCloudDeploymentBuilder, type SpringCloudFacadeOptions } from "./deployment.js";
export {
  ArmSpringCloudAppClient,
  ArmSpringCloudDeploymentClient,
  DEFAULT_RELATIVE_PATH,
  toDeploymentResource,
  type SpringCloudAppClient,
  type SpringCloudDeploymentClient,
} from "./client.js";
export { classifyDeployment, isDeploymentDone } from "./status.js";
export {
  normalizeRuntimeVersion,
  formatCpu,
  formatMemory,
  parseCpu,
  parseMemory,
  SUPPORTED_RUNTIME_VERSIONS,
  type RuntimeVersion,
} from "./convert.js";
export { SCALE_SETTING_KEYS } from "./types.js";
export type {
  RemotableArtifact,
  ScaleSettings,
  SpringCloudAppPatch,
  SpringCloudAppRef,
  SpringCloudAppState,
  SpringCloudDeploymentInstance,
  SpringCloudDeploymentPatch,
  SpringCloudDeploymentRef,
  SpringCloudDeploymentState,
  SpringCloudService,
  UploadLocation,
} from "./types.js";
