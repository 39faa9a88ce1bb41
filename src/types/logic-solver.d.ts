/**
 * Type declarations for the logic-solver package (MiniSat compiled to JavaScript),
 * which ships without typings.
 * https://www.npmjs.com/package/logic-solver
 */

declare module 'logic-solver' {
    interface Solver {
        /**
         * Require a formula to be true.
         */
        require(...formulas: Formula[]): void;

        /**
         * Solve the constraints and return a solution, or null if unsatisfiable.
         */
        solve(): Solution | null;
    }

    interface Solution {
        /**
         * Get the list of variables that are true.
         */
        getTrueVars(): string[];
    }

    type Formula = string | FormulaObject;

    interface FormulaObject {
        type: string;
        operands?: Formula[];
    }

    interface Logic {
        Solver: new () => Solver;
        or(...operands: Formula[]): Formula;
        not(operand: Formula): Formula;
    }

    const Logic: Logic;
    export = Logic;
}
