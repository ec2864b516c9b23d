export { renderPrompt, parseTemplate, templateVariables, validateTemplate } from "./template";
