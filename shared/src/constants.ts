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

export const DEFAULT_COORDINATOR_PORT = 9000;
export const DEFAULT_DATA_PARTY_BASE_PORT = 9001;
export const COORDINATOR_ID = 'coordinator';

export const MAX_TREE_DEPTH = 10;
export const MIN_INSTANCES_PER_LEAF = 5;
export const MIN_GAIN_THRESHOLD = 0.01;

export const REQUEST_TIMEOUT = 30000; // ms
export const MAX_CONNECTION_RETRIES = 3;
export const CONNECTION_RETRY_DELAY = 1000; // ms
export const MESSAGE_BODY_LIMIT = '50mb';

export const DEFAULT_MASK_BITS = 64;
export const MIN_MASK_BITS = 32;

export const MISSING_VALUE = -1;
export const NUMERIC_BINS = 10;

export const ROOT_BRANCH = 'root';

// Below this, split information is treated as zero
export const SPLIT_INFO_EPSILON = 1e-10;
