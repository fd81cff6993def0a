export { getLogger } from '@songharvest/platform-core';
