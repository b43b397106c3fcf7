export { getDeploymentConfig, resetDeploymentConfig } from './deployment';
export type { DeploymentConfig, DeploymentTarget } from './deployment';
