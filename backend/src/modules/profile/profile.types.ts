/**
 * backend/src/modules/profile/profile.types.ts
 */

export type ProfileFormInitial = {
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  referrer: string | null;
};

export type ProfilePage = {
  profile: true;
  form: { initial: ProfileFormInitial };
};
