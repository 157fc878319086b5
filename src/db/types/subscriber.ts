export interface Subscriber {
  id: string;
  name: string | null;
  email: string | null;
  emailOptIn: boolean;
  phone: string | null;
  smsOptIn: boolean;
  regions: string[];
  /** 비어 있으면 모든 hazard type 수신 */
  hazardTypes: string[];
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewSubscriber = Omit<Subscriber, 'id' | 'createdAt' | 'updatedAt'>;

export type SubscriberPatch = Partial<NewSubscriber>;
