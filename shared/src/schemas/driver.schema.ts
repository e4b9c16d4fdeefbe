import { z } from 'zod';

/** Log-sheet header fields supplied with a plan request. */
export const driverInfoSchema = z.object({
  driver_name: z.string().trim().min(1).max(100).default('N/A'),
  carrier_name: z.string().trim().min(1).max(200).default('N/A'),
  main_office: z.string().trim().min(1).max(200).default('N/A'),
  vehicle_number: z.string().trim().min(1).max(50).default('N/A'),
});

export type DriverInfoInput = z.infer<typeof driverInfoSchema>;
