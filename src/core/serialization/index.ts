export { parseYamlStream, toYaml, toYamlStream, type YamlRenderOptions } from './yaml.js';
