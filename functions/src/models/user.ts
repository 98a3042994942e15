export interface LocationProfile {
  latitude: number | null;
  longitude: number | null;
  city: string | null;
  country: string | null;
}

export interface UserProfile extends LocationProfile {
  id: string;
  updatedAt: Date | null;
}

export const EMPTY_LOCATION: LocationProfile = {
  latitude: null,
  longitude: null,
  city: null,
  country: null,
};
