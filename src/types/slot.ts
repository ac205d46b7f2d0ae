export type SlotStatus = 'available' | 'booked';

interface SlotBase {
  date: string;
  time: string;
  volunteer_name: string;
  volunteer_email: string;
  event_id: string | null;
}

export interface AvailableSlot extends SlotBase {
  status: 'available';
}

export interface BookedSlot extends SlotBase {
  status: 'booked';
  student_email: string;
  subject: string;
  description: string;
  booked_at: string;
}

export type Slot = AvailableSlot | BookedSlot;

export interface SlotFilter {
  date?: string;
  status?: SlotStatus;
}

export interface SlotSummary {
  available: number;
  booked: number;
  total: number;
}
