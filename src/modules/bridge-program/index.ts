export { BridgeProgramClient, encodeDepositData, decodeRouteData } from './bridge-program.service.js';
