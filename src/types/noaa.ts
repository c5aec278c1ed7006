export interface NoaaStationsApiResponse {
  count: number;
  stations: NoaaStation[];
}

export interface NoaaStation {
  state: string;
  tidepredoffsets?: {
    self: string;
  };
  type?: "R" | "S";
  timemeridian?: number | null;
  reference_id?: string;
  timezonecorr?: number;
  timezone?: string;
  id: string;
  name: string;
  lat: number;
  lng: number;
  affiliations?: string;
  portscode?: string;
  self?: string | null;
  tideType?: string;
}
