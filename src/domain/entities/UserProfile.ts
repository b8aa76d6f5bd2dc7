export interface UserProfile {
  id: string;
  name: string;
  consentGranted: boolean;
}
