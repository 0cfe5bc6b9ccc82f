/**
 * Deployment pipeline module
 */

export { runDeployment, collectAssets, inStage, type RunDeploymentOptions } from './run-deployment.js';
export { buildStackParameters, resourceTags, stackNameFor, type StackParameterInputs } from './parameters.js';
export { loadTemplate, resolveTemplatePath, findTemplatesDir, TEMPLATE_FILES } from './templates.js';
