import { Body, Controller, Post, Route, Tags } from "@tsoa/runtime";
import type {
  CityCorridorRequest,
  FlowAnalysisRequest,
  ProvinceCorridorRequest,
} from "../models/requests.js";
import type {
  CityCorridorResponse,
  CityFlowResponse,
  ProvinceCorridorResponse,
  ProvinceFlowResponse,
} from "../models/responses.js";
import type { Services } from "../services/index.js";

@Route("api/analyze")
@Tags("Analysis")
export class AnalysisController extends Controller {
  constructor(private readonly services: Services) {
    super();
  }

  /** Sent or received flow per province, ranked per day or over the window */
  @Post("province-flow")
  public async provinceFlow(@Body() body: FlowAnalysisRequest): Promise<ProvinceFlowResponse> {
    return this.services.analysis.provinceFlow(body);
  }

  /** Sent or received flow per city, ranked per day or over the window */
  @Post("city-flow")
  public async cityFlow(@Body() body: FlowAnalysisRequest): Promise<CityFlowResponse> {
    return this.services.analysis.cityFlow(body);
  }

  /** Top province-to-province corridors */
  @Post("province-corridor")
  public async provinceCorridor(
    @Body() body: ProvinceCorridorRequest,
  ): Promise<ProvinceCorridorResponse> {
    return this.services.analysis.provinceCorridor(body);
  }

  /** Top city corridors, split into intra- and inter-province lists */
  @Post("city-corridor")
  public async cityCorridor(@Body() body: CityCorridorRequest): Promise<CityCorridorResponse> {
    return this.services.analysis.cityCorridor(body);
  }
}
