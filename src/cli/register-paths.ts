import { registerPathAliases } from '../config/path-aliases';

registerPathAliases();
