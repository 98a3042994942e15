export interface RegistrationRecord {
  id: string;
  userId: string;
  eventId: number;
  createdAt: Date;
}
