import { Block } from '../types';

export interface BlockSource {
	/** latest slot known to the source */
	getTip(): Promise<number>;
	getBlock(slot: number): Promise<Block>;
	getNetworkVersion(): Promise<string>;
}
