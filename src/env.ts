import { cleanEnv, num, port, str, testOnly } from "envalid";

const env = cleanEnv(process.env, {
  MQTT_BROKER: str({
    desc: "MQTTブローカー",
    example: "mqtt://localhost",
    devDefault: testOnly("mqtt://mqtt-broker"),
  }),
  MQTT_USERNAME: str({
    desc: "MQTTユーザ名",
    default: undefined,
    devDefault: testOnly("test-user"),
  }),
  MQTT_PASSWORD: str({
    desc: "MQTTパスワード",
    default: undefined,
    devDefault: testOnly("test-password"),
  }),
  MQTT_TASK_INTERVAL: num({ desc: "MQTTタスク実行間隔", default: 100 }),
  ENTITY_QOS: num({
    desc: "エンティティのQOS設定",
    choices: [0, 1, 2],
    default: 1,
  }),
  LOG_LEVEL: str({ default: "info", desc: "ログ出力" }),
  HA_DISCOVERY_PREFIX: str({
    desc: "https://www.home-assistant.io/integrations/mqtt/#discovery-options",
    default: "homeassistant",
  }),
  PORT: port({
    desc: "ヘルスチェック用HTTPサーバーのポート",
    default: 3000,
    devDefault: testOnly(0),
  }),
  AVAILABILITY_INTERVAL: num({
    desc: "オンライン状態を送信する間隔",
    default: 10000,
  }),
  STATE_PUBLISH_INTERVAL: num({
    desc: "エンティティの状態を送信する間隔",
    default: 10000,
    devDefault: testOnly(100),
  }),
  FREQUENT_SCAN_INTERVAL: num({
    desc: "更新頻度FREQUENTのレジスタを読み出す間隔",
    default: 30000,
  }),
  INFREQUENT_SCAN_INTERVAL: num({
    desc: "更新頻度INFREQUENTのレジスタを読み出す間隔",
    default: 180000,
  }),
  STATIC_SCAN_INTERVAL: num({
    desc: "更新頻度STATICのレジスタを読み出す間隔",
    default: 3600000,
  }),
  ENTRY_ID: str({
    desc: "ユニークIDの接頭辞に使う識別子",
    default: "rct_power",
  }),
  ENTITY_PREFIX: str({
    desc: "エンティティ名の接頭辞",
    default: "RCT Power",
  }),
});

export default env;
