/*!
 * Copyright (c) Shehan Edirimannage, 2025
 *
 * This file is part of the SecHeto-FL project.
 * 
 * Licensed for evaluation and personal testing purposes only.
 * Redistribution, modification, or commercial use of this file,
 * in whole or in part, is strictly prohibited without explicit 
 * written permission from the copyright holder.
 *
 * For license inquiries, contact developers.
 */

export * from './constants';
export * from './errors';
export * from './types';
export * from './config';
export * from './format';

export * from './privacy/secureSum';
export * from './privacy/secureInformationGain';

export * from './core/branches';
export * from './core/treeBuilder';
export * from './core/localStatistics';

export * from './data/arff';
export * from './data/partitioning';
export * from './data/valuesFile';

export * from './prediction/traversal';

export * from './protocol/messages';
export * from './protocol/lifecycle';
export * from './protocol/transport';
export * from './protocol/connectionRegistry';
export * from './protocol/registration';
export * from './protocol/nodeServer';
export * from './protocol/httpTransport';
export * from './protocol/inProcessTransport';
