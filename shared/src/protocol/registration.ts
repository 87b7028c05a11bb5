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

import { z } from 'zod';

/** Body of the coordinator's `POST /register`. */
export const RegistrationRequestSchema = z.object({
  partyId: z.string().min(1),
  url: z.string().url(),
});

export const RegistrationResponseSchema = z.object({
  partyId: z.string(),
  registeredParties: z.array(z.string()),
});

export type RegistrationRequest = z.infer<typeof RegistrationRequestSchema>;
export type RegistrationResponse = z.infer<typeof RegistrationResponseSchema>;
