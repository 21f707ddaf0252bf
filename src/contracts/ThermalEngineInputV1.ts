/** Input contract accepted by the enclosure thermal engine (V1). */

/** One heat source inside a section (device, busbar run, cable bundle…). */
export interface HeatSourceV1 {
  name: string;
  /** Dissipated power per item in watts. */
  powerW: number;
  /** Number of identical items (default 1). */
  quantity?: number;
  /** Maximum ambient rating of the device in °C, used by `maxTempMode: 'auto'`. */
  maxTempC?: number;
}

export interface SectionVentilationV1 {
  enabled: boolean;
  /** Effective free inlet opening area in cm² (after any IP mesh derate). */
  inletAreaCm2: number;
  /**
   * 'installed' – the openings exist on the built enclosure.
   * 'what_if'   – the user is testing the effect of openings before committing.
   */
  mode?: 'installed' | 'what_if';
}

/**
 * One vertically-stacked compartment ("tier") of a switchboard layout.
 *
 * The layout is a front elevation: `xM` is the left edge and `yM` the bottom
 * edge in metres, with y increasing upwards.  Width and height of the layout
 * rectangle are the section's own width and height.
 */
export interface EnclosureSectionV1 {
  id: string;
  name?: string;

  xM: number;
  yM: number;
  widthM: number;
  heightM: number;
  depthM: number;

  /** Total dissipated power in watts. When omitted the heat sources are summed. */
  powerW?: number;
  heatSources?: HeatSourceV1[];

  ventilation?: SectionVentilationV1;

  /** Manual internal temperature limit (°C, default 70). */
  maxTempC?: number;
  /** 'auto' takes the lowest rating among the heat sources. */
  maxTempMode?: 'manual' | 'auto';

  /** Number of horizontal partitions inside the section (d-factor, default 0). */
  horizontalPartitions?: number;
}

/** Project-wide settings; everything except `ambientC` has a documented default. */
export interface ProjectThermalSettingsInputV1 {
  /** Ambient air temperature around the assembly (°C). */
  ambientC: number;
  /** Installation altitude above sea level (m). Default 0. */
  altitudeM?: number;
  /** Uniform temperature offset from solar radiation (K). Default 0. */
  solarOffsetK?: number;
  /** Heat-transfer coefficient of the enclosure material (W/m²K). Default 5.5 (painted sheet steel). */
  materialHeatTransferWm2K?: number;
  /** Credit heat rejected through the enclosure walls before sizing fans. Default true. */
  allowMaterialDissipation?: boolean;
  /** First IP digit of the assembly. IP5X and above ignores openings. Default 3. */
  ipRating?: number;
  /** All sections stand against a wall. Default false. */
  wallMounted?: boolean;
  /** Opening area tried by the ventilation recommendation (cm²). Default 300. */
  candidateInletAreaCm2?: number;
  /** Volumetric heat capacity of air at sea level (J/m³K). Default 1160. */
  volumetricHeatCapacityJm3K?: number;
  /** Distance under which two faces count as touching (m). Default 0.001. */
  touchToleranceM?: number;
}

export interface ThermalEngineInputV1 {
  sections: EnclosureSectionV1[];
  settings: ProjectThermalSettingsInputV1;
}
