export const PROFILE_FIELDS = ['email', 'firstName', 'lastName'] as const;

export type UpdateUserProfileDto = Partial<Record<(typeof PROFILE_FIELDS)[number], string>>;
