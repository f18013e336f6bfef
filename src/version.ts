import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const pkg: { name: string; version: string } = require('../package.json');

export const VERSION = pkg.version;
export const USER_AGENT = `${pkg.name}/${pkg.version}`;
