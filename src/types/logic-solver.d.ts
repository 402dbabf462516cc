/**
 * Type declarations for the logic-solver package, limited to what the
 * MiniSat engine uses. The package ships no types of its own.
 * https://www.npmjs.com/package/logic-solver
 */

declare module 'logic-solver' {
    namespace Logic {
        type Formula = string | FormulaObject;

        interface FormulaObject {
            type: string;
            operands?: Formula[];
        }

        interface Solution {
            /**
             * Get the assignment map from variable names to booleans.
             */
            getMap(): Record<string, boolean>;
        }

        interface Solver {
            /**
             * Require a formula to be true.
             */
            require(formula: Formula): void;

            /**
             * Solve the constraints and return a solution, or null if unsatisfiable.
             */
            solve(): Solution | null;
        }

        const Solver: new () => Solver;

        /**
         * Create a disjunction (OR) formula.
         */
        function or(...operands: Formula[]): Formula;

        /**
         * Create a negation (NOT) formula.
         */
        function not(operand: Formula): Formula;
    }

    export = Logic;
}
