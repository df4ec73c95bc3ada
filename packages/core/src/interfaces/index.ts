export type {
  IManagedModule,
  PeerInfo,
  INetworkModule,
  IChainStateModule,
  ITransactionPoolModule,
  IServingModule,
  IPoolModule,
} from './modules.js';
