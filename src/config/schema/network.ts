import { z } from "zod";
import { isIpv4Multicast } from "../../transport/multicast";

export const DEFAULT_MULTICAST_ADDRESS = "239.255.255.250";
export const DEFAULT_MULTICAST_PORT = 8080;

export const NetworkSchema = z
  .object({
    multicastAddress: z
      .string()
      .default(DEFAULT_MULTICAST_ADDRESS)
      .refine(isIpv4Multicast, (address) => ({
        message: `Address ${address} is not a valid multicast address`,
      })),
    port: z.number().int().min(1).max(65_535).default(DEFAULT_MULTICAST_PORT),
    interface: z.string().trim().min(1).optional(),
  })
  .strict();

export type NetworkConfig = z.infer<typeof NetworkSchema>;
