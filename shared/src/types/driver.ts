/** Header fields printed on every daily log sheet. */
export interface DriverInfo {
  driverName: string;
  carrierName: string;
  mainOffice: string;
  vehicleNumber: string;
}
