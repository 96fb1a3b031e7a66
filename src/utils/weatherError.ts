import type { WeatherError } from "../domain/errors";

export function formatWeatherError(error: WeatherError): string {
  switch (error.type) {
    case "LocationNotFound":
      return "无法确定当前位置所在的地区";
    case "InvalidAdministrativeCode":
      return "行政区划代码无效";
    case "NetworkError":
      return "网络请求失败，请稍后重试";
    case "DataParsingError":
      return "天气数据解析失败";
    case "CityNotFound":
      return "未找到该城市";
    case "LocationAuthorizationDenied":
      return "定位权限被拒绝，请在设置中开启";
    case "LocationAuthorizationTimeout":
      return "等待定位授权超时";
    case "LocationServiceFailed":
      return "定位服务不可用";
    case "NetworkUnavailable":
      return "网络不可用";
    case "Throttled":
      return "请求过于频繁，请稍后再试";
    case "ApiError":
      return `接口错误：${error.message}`;
    case "MissingCredentials":
      return "缺少接口密钥";
    case "InvalidCredentials":
      return "接口密钥无效";
    case "RateLimited":
      return "请求次数超出限制";
    case "ServerError":
      return `服务器错误（${error.status}）`;
    case "HttpError":
      return `请求失败（${error.status}）`;
    case "Cancelled":
      return "请求已取消";
    case "MultipleErrors": {
      const cities = Object.keys(error.errors);
      return `${cities.length} 个城市更新失败：${cities.join("、")}`;
    }
    default:
      return "未知错误";
  }
}
