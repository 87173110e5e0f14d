export { SplCustodyAsset, CustodyLocalTransfer } from './spl-custody.service.js';
