// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

type StateHandler = () => Promise<void> | void;

export abstract class AbstractStateMachine<S extends string, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: StateHandler }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Runs every registered handler in order, then moves to the completion state.
     * The first failing handler moves the machine to the error state and its error
     * is rethrown unchanged.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.handleError(failure);
            throw error;
        }
    }

    /**
     * Moves to `nextState`, reporting the step to the progress bar and, in verbose
     * mode, to the logger.
     */
    protected transitionTo(nextState: S): void {
        const { logger, verbose, progressBar } = this.options;
        if (verbose) {
            logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
        }
        progressBar?.increment({ state: nextState });
        this.state = nextState;
    }

    private handleError(error: Error): void {
        const { logger, progressBar } = this.options;
        const failedState = this.state;
        this.state = this.getErrorState();
        progressBar?.stop();
        logger.error(`${failedState} failed: ${error.message}`);
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
