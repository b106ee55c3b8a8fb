export { getDeploymentConfig, loadDeploymentConfig, resetDeploymentConfig } from './deployment';
export type { DeploymentConfig } from './deployment';
