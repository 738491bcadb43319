import express from 'express';
import { AppError, IngredientFetchError } from '../errors';
import { BatchCostCalculator } from '../services/batchCost';
import { serializeCalculation } from '../utils/serializeCalculation';
import { parsePositiveInteger, pickFirstParam } from '../utils/requestParsing';

const INVALID_INPUT_MESSAGE = 'personas and gpp must be positive integers.';

/**
 * Run one calculation and map failures onto HTTP statuses:
 * 400 for bad input, 502 when a price could not be fetched, 500 otherwise.
 */
const respondWithCalculation = async (
    calculator: BatchCostCalculator,
    rawServings: unknown,
    rawGramsPerServing: unknown,
    res: express.Response
): Promise<void> => {
    const servings = parsePositiveInteger(rawServings);
    const gramsPerServing = parsePositiveInteger(rawGramsPerServing);
    if (servings === null || gramsPerServing === null) {
        res.status(400).json({ message: INVALID_INPUT_MESSAGE });
        return;
    }

    try {
        const result = await calculator.calculate(servings, gramsPerServing);
        res.json(serializeCalculation(result));
    } catch (err) {
        console.error('calc error:', err);
        if (err instanceof IngredientFetchError) {
            res.status(502).json({ message: err.message, ingredient: err.ingredient });
            return;
        }
        if (err instanceof AppError && err.code === 'VALIDATION_ERROR') {
            res.status(400).json({ message: err.message });
            return;
        }
        res.status(500).json({ message: 'Unable to calculate costs right now.' });
    }
};

export const createCalcRouter = (calculator: BatchCostCalculator): express.Router => {
    const router = express.Router();

    router.get('/', async (req, res) => {
        await respondWithCalculation(
            calculator,
            pickFirstParam(req.query.personas, req.query.servings),
            pickFirstParam(req.query.gpp, req.query.gramsPerServing),
            res
        );
    });

    router.post('/', async (req, res) => {
        const body: Record<string, unknown> = req.body && typeof req.body === 'object' ? req.body : {};
        await respondWithCalculation(
            calculator,
            pickFirstParam(body.personas, body.servings),
            pickFirstParam(body.gpp, body.gramsPerServing),
            res
        );
    });

    return router;
};
