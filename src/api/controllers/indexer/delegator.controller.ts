import { Request, Response } from 'express';
import { IDelegatorRepository, ITransactionRepository } from '../../../database/repositories/interfaces';
import { NotFoundError, RequestValidationError } from '../../../types/errors';
import { formatPaginatedResponse, parsePageQuery } from '../../middleware';

export class DelegatorController {
    private readonly delegators: IDelegatorRepository;
    private readonly transactions: ITransactionRepository;
    private readonly validatorAccountId: string;

    constructor(delegators: IDelegatorRepository, transactions: ITransactionRepository, validatorAccountId: string) {
        this.delegators = delegators;
        this.transactions = transactions;
        this.validatorAccountId = validatorAccountId;
    }

    /**
     * Every snapshot of a delegator, newest epoch first
     */
    getDelegator = async (req: Request, res: Response): Promise<void> => {
        const { delegatorId } = req.params;
        const snapshots = await this.delegators.findByDelegator(this.validatorAccountId, delegatorId);
        if (snapshots.length === 0) {
            throw new NotFoundError(`Delegator ${delegatorId} has no snapshots`);
        }
        res.json({ delegatorId, validatorAccountId: this.validatorAccountId, snapshots });
    };

    getTransactions = async (req: Request, res: Response): Promise<void> => {
        const delegator = req.query.delegator;
        if (typeof delegator !== 'string' || delegator.length === 0) {
            throw new RequestValidationError('delegator query parameter is required');
        }
        const query = parsePageQuery(req.query);
        const page = await this.transactions.findByDelegator(delegator, query);
        res.json(formatPaginatedResponse(page.items, page.total, page.page, page.limit));
    };
}
