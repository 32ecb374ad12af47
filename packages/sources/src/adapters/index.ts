export { BrowsingSource, DEFAULT_FETCH_TIMEOUT_MS } from "./browsing-source.js";
export { APNewsSource } from "./apnews.js";
export { AustinChronicleSource } from "./austinchronicle.js";
export { BBCSource } from "./bbc.js";
export { BlockClubChicagoSource } from "./blockclubchicago.js";
export { DoorCountyPulseSource } from "./doorcountypulse.js";
export { FolioWeeklySource } from "./folioweekly.js";
export { GambitSource } from "./gambit.js";
export { GoogleNewsSource } from "./googlenews.js";
export { GothamistSource } from "./gothamist.js";
export { IExaminerSource } from "./iexaminer.js";
export { LATacoSource } from "./lataco.js";
export { Magazine303Source } from "./magazine303.js";
export { MiamiLivingSource } from "./miamiliving.js";
export { ReutersSource } from "./reuters.js";
export { SlugMagSource } from "./slugmag.js";
export { STLMagSource } from "./stlmag.js";
export { UrbanMilwaukeeSource } from "./urbanmilwaukee.js";
