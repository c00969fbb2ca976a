import { EntityUpdatePriority, MeteredResetFrequency } from "@/const";
import type {
  EntityDescription,
  EntityDescriptionOptions,
} from "@/entity/description";
import { createEntityDescription } from "@/entity/description";
import type { ObjectRegistry } from "@/registry/objectRegistry";

const inverterSensors: EntityDescriptionOptions[] = [
  {
    key: "inverter_sn",
    name: "Inverter Serial Number",
    icon: "mdi:identifier",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "android_description",
    name: "Inverter Description",
    icon: "mdi:information",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "svnversion",
    name: "Inverter Software Version",
    icon: "mdi:information",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "dc_conv.dc_conv_struct[0].p_dc_lp",
    name: "Generator A Power",
    stateClass: "measurement",
  },
  {
    key: "dc_conv.dc_conv_struct[1].p_dc_lp",
    name: "Generator B Power",
    stateClass: "measurement",
  },
  {
    key: "dc_conv.dc_conv_struct[0].u_sg_lp",
    name: "Generator A Voltage",
    stateClass: "measurement",
  },
  {
    key: "dc_conv.dc_conv_struct[1].u_sg_lp",
    name: "Generator B Voltage",
    stateClass: "measurement",
  },
  {
    key: "g_sync.p_ac_sum_lp",
    name: "Inverter Power",
    stateClass: "measurement",
  },
  {
    key: "g_sync.p_ac_load_sum_lp",
    name: "Consumer Power",
    stateClass: "measurement",
  },
  {
    key: "g_sync.p_ac_grid_sum_lp",
    name: "Grid Power",
    stateClass: "measurement",
  },
  {
    key: "g_sync.u_l_rms[0]",
    name: "Grid Voltage P1",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "g_sync.u_l_rms[1]",
    name: "Grid Voltage P2",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "g_sync.u_l_rms[2]",
    name: "Grid Voltage P3",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "grid_pll[0].f",
    name: "Grid Frequency",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "db.temp1",
    name: "Inverter Temperature",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "prim_sm.island_flag",
    name: "Grid Separated",
    icon: "mdi:transmission-tower-off",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "wifi.connected_ap_bssid",
    name: "WiFi Access Point",
    icon: "mdi:wifi",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "energy.e_ac_day",
    name: "Inverter Energy Production Day",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.DAILY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "energy.e_ac_month",
    name: "Inverter Energy Production Month",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.MONTHLY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "energy.e_ac_year",
    name: "Inverter Energy Production Year",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.YEARLY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "energy.e_ac_total",
    name: "Inverter Energy Production Total",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.INITIALLY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "energy.e_grid_feed_day",
    name: "Grid Energy Feed Day",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.DAILY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "energy.e_grid_load_day",
    name: "Grid Energy Consumption Day",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.DAILY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "fault_bitmasks",
    name: "Faults",
    icon: "mdi:alert",
    kind: "fault",
    objectNames: [
      "fault[0].flt",
      "fault[1].flt",
      "fault[2].flt",
      "fault[3].flt",
    ],
  },
];

const batterySensors: EntityDescriptionOptions[] = [
  {
    key: "battery.bms_sn",
    name: "Battery Serial Number",
    icon: "mdi:identifier",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "battery.bms_software_version",
    name: "Battery Software Version",
    icon: "mdi:information",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "battery.soc",
    name: "Battery State of Charge",
    deviceClass: "battery",
    stateClass: "measurement",
  },
  {
    key: "battery.soc_target",
    name: "Battery Target State of Charge",
    icon: "mdi:battery-arrow-up",
    stateClass: "measurement",
  },
  {
    key: "g_sync.p_acc_lp",
    name: "Battery Power",
    stateClass: "measurement",
  },
  {
    key: "battery.voltage",
    name: "Battery Voltage",
    stateClass: "measurement",
  },
  {
    key: "battery.temperature",
    name: "Battery Temperature",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "battery.soh",
    name: "Battery State of Health",
    icon: "mdi:battery-heart-variant",
    stateClass: "measurement",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "battery.cycles",
    name: "Battery Cycles",
    icon: "mdi:battery-sync",
    stateClass: "total_increasing",
    updatePriority: EntityUpdatePriority.STATIC,
  },
  {
    key: "battery.stored_energy",
    name: "Battery Stored Energy",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.INITIALLY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "battery.used_energy",
    name: "Battery Used Energy",
    stateClass: "total",
    meteredReset: MeteredResetFrequency.INITIALLY,
    updatePriority: EntityUpdatePriority.INFREQUENT,
  },
  {
    key: "battery_stacks",
    name: "Battery Stacks",
    icon: "mdi:car-battery",
    kind: "attributes",
    objectNames: [
      "battery.stack_software_version[0]",
      "battery.stack_software_version[1]",
      "battery.stack_cycles[0]",
      "battery.stack_cycles[1]",
    ],
    updatePriority: EntityUpdatePriority.STATIC,
  },
];

/**
 * Home Assistant に登録するエンティティの定義を作成します
 */
export function createEntityDescriptions(
  registry: ObjectRegistry,
): EntityDescription[] {
  return [
    ...inverterSensors.map((options) =>
      createEntityDescription(registry, { ...options, device: "inverter" }),
    ),
    ...batterySensors.map((options) =>
      createEntityDescription(registry, { ...options, device: "battery" }),
    ),
  ];
}
