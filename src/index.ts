/* --------------------------------------------------------------------------------------------
 * Copyright (c) Jan Dolejsi. All rights reserved.
 * Licensed under the MIT License. See License.txt in the project root for license information.
 * ------------------------------------------------------------------------------------------ */
'use strict';

export * from './errors';
export * from './enumerations';
export * from './Topology';
export * from './Registry';
export * from './Fluent';
export * from './Grounder';
export * from './FluentVocabulary';
export * from './ConstraintEncoder';
export * from './ActionInstance';
export * from './ActionGenerator';
export * from './Goal';
export * from './PlanningProblem';
export * from './ProblemAssembler';
export * from './PlanValidator';
export * from './PddlWriter';
export * from './PlanningResult';
export * from './Planner';
export * from './CommandRunner';
export * from './PlannerExecutable';
export * from './configuration';
export * from './Scenario';
