export interface EpochGrid {
    genesisStartHeight: number;
    epochBlocks: number;
}

export interface EpochBounds {
    epoch: number;
    startBlock: number;
    endBlock: number;
}

/**
 * Epoch containing `height`. Epochs are numbered from 1 at the genesis start height.
 */
export function epochOf(height: number, grid: EpochGrid): EpochBounds {
    if (height < grid.genesisStartHeight) {
        throw new RangeError(`Height ${height} is below the genesis start height ${grid.genesisStartHeight}`);
    }
    const index = Math.floor((height - grid.genesisStartHeight) / grid.epochBlocks);
    const startBlock = grid.genesisStartHeight + index * grid.epochBlocks;
    return {
        epoch: index + 1,
        startBlock,
        endBlock: startBlock + grid.epochBlocks - 1
    };
}
