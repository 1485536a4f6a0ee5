export {
  DeployStep,
  createDeployStep,
  DEPLOY_OPERATION,
  ERROR_CODE_FAILURE,
  ERROR_CODE_SUCCESS,
  TOOLKIT_NAME,
  TOOLKIT_VERSION,
} from "./step.js";
export type { DeployConnection, DeployCredentials, DeployResult, DeployStepOptions, DeployTarget } from "./step.js";
